/**
 * Delivery domain model.
 *
 * One public request for a certificate walks a fixed sequence of stages.
 * Cheap checks come first so that a rejected request never reaches the
 * network fetch or the render pool.
 */

/** Per-request delivery stages. `Delivered` and `Failed` are terminal. */
export enum DeliveryStage {
  Received = 'received',
  RateChecked = 'rate_checked',
  SlugValidated = 'slug_validated',
  RecordFound = 'record_found',
  UrlValidated = 'url_validated',
  AssetFetched = 'asset_fetched',
  Rendered = 'rendered',
  Delivered = 'delivered',
  Failed = 'failed',
}

/** Valid stage transitions. Every non-terminal stage may fail. */
export const VALID_DELIVERY_TRANSITIONS: Record<DeliveryStage, DeliveryStage[]> = {
  [DeliveryStage.Received]: [DeliveryStage.RateChecked, DeliveryStage.Failed],
  [DeliveryStage.RateChecked]: [DeliveryStage.SlugValidated, DeliveryStage.Failed],
  [DeliveryStage.SlugValidated]: [DeliveryStage.RecordFound, DeliveryStage.Failed],
  [DeliveryStage.RecordFound]: [DeliveryStage.UrlValidated, DeliveryStage.Failed],
  [DeliveryStage.UrlValidated]: [DeliveryStage.AssetFetched, DeliveryStage.Failed],
  [DeliveryStage.AssetFetched]: [DeliveryStage.Rendered, DeliveryStage.Failed],
  [DeliveryStage.Rendered]: [DeliveryStage.Delivered, DeliveryStage.Failed],
  [DeliveryStage.Delivered]: [],
  [DeliveryStage.Failed]: [],
};

/** Rate-limit buckets. Each carries an independent per-client budget. */
export type RouteClass = 'view' | 'preview' | 'download' | 'batch' | 'admin' | 'login';

/** Formats the renderer produces. */
export type RenderFormat = 'svg' | 'pdf' | 'png';

/** Formats a public route can ask for. `html` wraps the SVG in a page. */
export type DeliveryFormat = RenderFormat | 'html';

/** Formats whose successful delivery counts as a view of the certificate. */
export const COUNTED_FORMATS: ReadonlySet<DeliveryFormat> = new Set<DeliveryFormat>(['html', 'pdf']);

/** Output of a render. */
export interface RenderedAsset {
  format: RenderFormat;
  contentType: string;
  body: Buffer;
}
