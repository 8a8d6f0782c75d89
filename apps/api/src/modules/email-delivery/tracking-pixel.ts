/** 1x1 transparent GIF served for `opened` callbacks. */
export const TRANSPARENT_GIF = Buffer.from(
  '4749463839610100010080000000000000000021f90401000000002c00000000010001000002020401003b',
  'hex'
);

export const buildTrackingUrl = (baseUrl: string, trackingId: string, event: string): string =>
  `${baseUrl.replace(/\/+$/, '')}/track/${encodeURIComponent(trackingId)}/${event}`;

export const buildTrackingPixel = (baseUrl: string, trackingId: string): string =>
  `<img src="${buildTrackingUrl(baseUrl, trackingId, 'opened')}" width="1" height="1" style="display:none;" />`;
