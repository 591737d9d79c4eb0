/**
 * HTML pages for the public certificate view.
 *
 * The SVG is embedded as a data: URI inside an <img>, which keeps any script
 * in the asset inert. All record fields are HTML-escaped.
 */

import { CertificateRecord, certificatePath } from '../domain/certificate';

export interface PageContext {
  appName: string;
  appUrl: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const DATE_FORMAT = new Intl.DateTimeFormat('en-GB', { dateStyle: 'long', timeZone: 'UTC' });

/** "15 January 2024" for an ISO timestamp; the raw value when it does not parse. */
export function formatIssueDate(iso: string): string {
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? iso : DATE_FORMAT.format(date);
}

export function renderCertificatePage(record: CertificateRecord, svg: Buffer, ctx: PageContext): string {
  const base = ctx.appUrl.replace(/\/+$/, '');
  const pageUrl = `${base}${certificatePath(record.slug)}`;
  const name = escapeHtml(record.recipientName);
  const appName = escapeHtml(ctx.appName);
  const slug = encodeURIComponent(record.slug);

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${name} | ${appName}</title>
  <meta property="og:title" content="Certificate of ${name}">
  <meta property="og:url" content="${escapeHtml(pageUrl)}">
  <meta property="og:image" content="${escapeHtml(`${base}/preview/${slug}`)}">
  <meta property="og:type" content="website">
  <style>
    body { margin: 0; font-family: system-ui, sans-serif; background: #f4f4f6; color: #1d1d1f; }
    main { max-width: 1100px; margin: 0 auto; padding: 32px 16px; text-align: center; }
    img.certificate { width: 100%; height: auto; box-shadow: 0 4px 24px rgba(0, 0, 0, 0.12); background: #fff; }
    nav a { display: inline-block; margin: 16px 8px; padding: 10px 20px; border-radius: 6px; background: #673de6; color: #fff; text-decoration: none; }
  </style>
</head>
<body>
  <main>
    <h1>${name}</h1>
    <p>Issued ${escapeHtml(formatIssueDate(record.createdAt))}</p>
    <img class="certificate" alt="Certificate of ${name}" src="data:image/svg+xml;base64,${svg.toString('base64')}">
    <nav>
      <a href="/certificate/${slug}/pdf">Download PDF</a>
      <a href="/download/${slug}">Download SVG</a>
    </nav>
  </main>
</body>
</html>
`;
}

/** Minimal error page for the HTML route. */
export function renderErrorPage(status: number, message: string, ctx: PageContext): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>${status} | ${escapeHtml(ctx.appName)}</title>
</head>
<body>
  <main>
    <h1>${status}</h1>
    <p>${escapeHtml(message)}</p>
  </main>
</body>
</html>
`;
}
