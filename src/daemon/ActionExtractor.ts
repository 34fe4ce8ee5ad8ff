/**
 * SOAPAction extraction from transport headers.
 *
 * Clients are sloppy with SOAPAction: unquoted, half-quoted, padded with
 * blanks. Values are normalized, never rejected.
 */

import { SOAP_NAMESPACES } from '../soap/ProtocolVersion.js';

/**
 * Header lookup by name. Implementations must match names
 * case-insensitively; repeated headers may come back as an array.
 */
export type HeaderAccessor = (name: string) => string | string[] | undefined;

/** Extension identifier used in the Man header of M-POST requests */
export const HTTP_EXTENSION_ID = SOAP_NAMESPACES.SOAP11_ENVELOPE;

/**
 * Strip surrounding blanks and quote characters.
 */
export function normalizeSoapAction(raw: string): string {
  return raw.trim().replace(/^["']+/, '').replace(/["']+$/, '').trim();
}

/**
 * Header accessor over a plain header record (e.g. Node's IncomingHttpHeaders).
 */
export function headerAccessor(headers: Readonly<Record<string, string | string[] | undefined>>): HeaderAccessor {
  const lowered = new Map<string, string | string[] | undefined>();
  for (const [key, value] of Object.entries(headers)) {
    lowered.set(key.toLowerCase(), value);
  }
  return (name) => lowered.get(name.toLowerCase());
}

function headerValues(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return headerValues(value)[0];
}

/**
 * The SOAPAction of a request, or undefined when the method carries none.
 *
 * - POST: the SOAPAction header
 * - M-POST (HTTP Extension Framework): the Man header declaring the SOAP
 *   extension names a numeric prefix N (`; ns=N`); the action is in the
 *   `N-SOAPAction` header
 */
export function extractSoapAction(method: string, headers: HeaderAccessor): string | undefined {
  let action: string | undefined;

  if (method === 'POST') {
    action = firstHeader(headers('SOAPAction'));
  } else if (method === 'M-POST') {
    const extensionId = `"${HTTP_EXTENSION_ID}"`;
    const man = headerValues(headers('Man'))
      .flatMap((value) => value.split(','))
      .find((entry) => entry.includes(extensionId));
    if (man === undefined) return undefined;

    const ns = /;\s*ns=(\d+)/.exec(man)?.[1];
    if (ns === undefined) return undefined;

    action = firstHeader(headers(`${ns}-SOAPAction`));
  } else {
    return undefined;
  }

  return action === undefined ? undefined : normalizeSoapAction(action);
}
