/**
 * Certificate SVG template.
 *
 * The template is a plain SVG document with `{{NAME}}` wherever the
 * recipient's name goes. The name is XML-escaped before substitution.
 */

import { readFile } from 'fs/promises';
import { svgProblem } from '../render/renderer';

export const NAME_PLACEHOLDER = '{{NAME}}';

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);
}

export interface TemplateFields {
  name: string;
}

export function fillTemplate(template: string, fields: TemplateFields): string {
  return template.replaceAll(NAME_PLACEHOLDER, escapeXml(fields.name));
}

/** Read and check a template file. Throws when it is not an SVG document or has no placeholder. */
export async function loadTemplate(templatePath: string): Promise<string> {
  const content = await readFile(templatePath, 'utf8');
  const problem = svgProblem(Buffer.from(content, 'utf8'));
  if (problem) {
    throw new Error(`Certificate template ${templatePath} is not usable: ${problem}`);
  }
  if (!content.includes(NAME_PLACEHOLDER)) {
    throw new Error(`Certificate template ${templatePath} has no ${NAME_PLACEHOLDER} placeholder`);
  }
  return content;
}
