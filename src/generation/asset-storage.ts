/**
 * Asset storage for generated certificates (Cloudinary).
 *
 * SVGs are uploaded as raw files under `<folder>/<slug>`. Uploads never
 * overwrite: an existing public id is reported as a duplicate so the
 * generator can move on to the next free slug. An upload whose record could
 * not be saved is removed again with deleteAsset.
 */

import { v2 as cloudinary, UploadApiOptions } from 'cloudinary';
import { CloudinaryConfig } from '../config';
import {
  CertificateError,
  assetExistsError,
  storageNotConfiguredError,
  upstreamError,
} from '../domain/errors';
import { Logger, errorContext, logger as rootLogger } from '../logger';

export interface StoredAsset {
  publicId: string;
  url: string;
  bytes: number;
}

export interface AssetStorage {
  readonly configured: boolean;
  uploadSvg(svg: string, publicId: string): Promise<StoredAsset>;
  /** Remove an uploaded asset by the full public id returned from uploadSvg. A missing asset is not an error. */
  deleteAsset(publicId: string): Promise<void>;
}

/** The part of an upload response this module reads. */
export interface UploadResult {
  public_id: string;
  secure_url: string;
  bytes: number;
  existing?: boolean;
}

export type UploadFn = (file: string, options: UploadApiOptions) => Promise<UploadResult>;

export interface DestroyResult {
  result: string;
}

export type DestroyFn = (publicId: string, options: { resource_type: 'raw'; invalidate: boolean }) => Promise<DestroyResult>;

const DESTROYED = new Set(['ok', 'not found']);

export class CloudinaryStorage implements AssetStorage {
  readonly configured = true;
  private readonly upload: UploadFn;
  private readonly destroy: DestroyFn;
  private readonly log: Logger;

  constructor(
    private readonly config: CloudinaryConfig,
    options: { upload?: UploadFn; destroy?: DestroyFn; logger?: Logger } = {},
  ) {
    if (!options.upload || !options.destroy) {
      cloudinary.config({
        cloud_name: config.cloudName,
        api_key: config.apiKey,
        api_secret: config.apiSecret,
        secure: true,
      });
    }
    this.upload = options.upload ?? ((file, uploadOptions) => cloudinary.uploader.upload(file, uploadOptions));
    this.destroy = options.destroy ?? ((publicId, destroyOptions) => cloudinary.uploader.destroy(publicId, destroyOptions));
    this.log = options.logger ?? rootLogger.child({ module: 'cloudinary' });
  }

  async uploadSvg(svg: string, publicId: string): Promise<StoredAsset> {
    const dataUri = `data:image/svg+xml;base64,${Buffer.from(svg, 'utf8').toString('base64')}`;
    let result: UploadResult;
    try {
      result = await this.upload(dataUri, {
        folder: this.config.folder,
        public_id: publicId,
        resource_type: 'raw',
        overwrite: false,
      });
    } catch (err) {
      this.log.error('Cloudinary upload failed', { publicId, ...errorContext(err) });
      throw new CertificateError(upstreamError(`Cloudinary upload failed: ${errorMessage(err)}`));
    }

    if (result.existing) {
      throw new CertificateError(assetExistsError(result.public_id));
    }
    this.log.info('Certificate uploaded', { publicId: result.public_id, bytes: result.bytes });
    return { publicId: result.public_id, url: result.secure_url, bytes: result.bytes };
  }

  async deleteAsset(publicId: string): Promise<void> {
    let result: DestroyResult;
    try {
      result = await this.destroy(publicId, { resource_type: 'raw', invalidate: true });
    } catch (err) {
      throw new CertificateError(upstreamError(`Cloudinary delete failed: ${errorMessage(err)}`));
    }
    if (!DESTROYED.has(result.result)) {
      throw new CertificateError(upstreamError(`Cloudinary delete failed: ${result.result}`));
    }
    this.log.info('Certificate asset deleted', { publicId });
  }
}

/** Stand-in used when Cloudinary credentials are missing. */
export class UnconfiguredStorage implements AssetStorage {
  readonly configured = false;

  async uploadSvg(): Promise<StoredAsset> {
    throw new CertificateError(storageNotConfiguredError());
  }

  async deleteAsset(): Promise<void> {
    throw new CertificateError(storageNotConfiguredError());
  }
}

export function createAssetStorage(config: CloudinaryConfig | null): AssetStorage {
  return config ? new CloudinaryStorage(config) : new UnconfiguredStorage();
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  // The SDK rejects with a plain `{ message, http_code }` object.
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}
