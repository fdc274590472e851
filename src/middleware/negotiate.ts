/**
 * Negotiation Middleware - Accept and Content-Type gate
 *
 * Rejects requests whose Accept header rules out the response media
 * type (406) and, for routes that read a body, requests whose
 * Content-Type is anything else (415). Runs as a `before` hook, so it
 * precedes body parsing, validation and storage access.
 *
 * @module middleware/negotiate
 * @category Middleware
 */

import { NotAcceptableError, UnsupportedMediaTypeError } from '../errors';
import type { Middleware, MiddlewareContext } from './types';

/**
 * The media type this API produces and consumes.
 */
export const JSON_MIME_TYPE = 'application/json';

/**
 * Configuration options for negotiation middleware.
 */
export interface NegotiationMiddlewareConfig {
  /** Media type the client must accept (default: application/json) */
  accept?: string;
  /** Media type the request body must have; unset for routes without a body */
  contentType?: string;
}

/**
 * A parsed Accept header entry.
 */
interface MediaRange {
  type: string;
  subtype: string;
  quality: number;
}

/**
 * Parse an Accept header into media ranges. Malformed entries are
 * skipped; an unreadable q parameter counts as 1.
 */
export function parseAccept(header: string): MediaRange[] {
  const ranges: MediaRange[] = [];

  for (const entry of header.split(',')) {
    const [media, ...params] = entry.split(';').map((part) => part.trim());
    const [type, subtype] = media.toLowerCase().split('/');
    if (!type || !subtype) continue;

    let quality = 1;
    for (const param of params) {
      const [key, value] = param.split('=').map((part) => part.trim());
      if (key.toLowerCase() === 'q' && value !== undefined) {
        const parsed = Number(value);
        quality = Number.isNaN(parsed) ? 1 : parsed;
      }
    }

    ranges.push({ type, subtype, quality });
  }

  return ranges;
}

/**
 * Check whether an Accept header admits a media type.
 *
 * The most specific matching range decides (`type/subtype` over
 * `type/*` over `*\/*`); it admits the type when its quality is above 0.
 * A missing or blank header admits everything.
 *
 * @example
 * ```typescript
 * acceptsMimeType('text/html, application/*;q=0.8', 'application/json'); // true
 * acceptsMimeType('application/xml', 'application/json'); // false
 * ```
 */
export function acceptsMimeType(header: string | null, mimeType: string): boolean {
  if (header === null || header.trim() === '') {
    return true;
  }

  const [type, subtype] = mimeType.toLowerCase().split('/');
  let best: { specificity: number; quality: number } | null = null;

  for (const range of parseAccept(header)) {
    let specificity: number;
    if (range.type === type && range.subtype === subtype) {
      specificity = 3;
    } else if (range.type === type && range.subtype === '*') {
      specificity = 2;
    } else if (range.type === '*' && range.subtype === '*') {
      specificity = 1;
    } else {
      continue;
    }

    if (!best || specificity > best.specificity) {
      best = { specificity, quality: range.quality };
    }
  }

  return best !== null && best.quality > 0;
}

/**
 * Check whether a Content-Type header names a media type, ignoring
 * parameters such as charset.
 */
export function hasContentType(header: string | null, mimeType: string): boolean {
  if (header === null) {
    return false;
  }
  const [media] = header.split(';');
  return media.trim().toLowerCase() === mimeType.toLowerCase();
}

/**
 * Create a negotiation middleware.
 *
 * @example
 * ```typescript
 * // Read routes
 * createNegotiationMiddleware();
 *
 * // Routes with a JSON body
 * createNegotiationMiddleware({ contentType: 'application/json' });
 * ```
 */
export function createNegotiationMiddleware(config?: NegotiationMiddlewareConfig): Middleware {
  const { accept = JSON_MIME_TYPE, contentType } = config ?? {};

  return {
    name: 'negotiate',

    async before(ctx: MiddlewareContext) {
      const { headers } = ctx.request;

      if (!acceptsMimeType(headers.get('accept'), accept)) {
        return { continue: false, error: new NotAcceptableError(accept) };
      }

      if (contentType && !hasContentType(headers.get('content-type'), contentType)) {
        return { continue: false, error: new UnsupportedMediaTypeError(contentType) };
      }

      return { continue: true };
    },
  };
}
