/**
 * SOAP protocol versions and the table that recognizes them by envelope
 * namespace.
 */

export enum SoapVersion {
  SOAP11 = 'SOAP11',
  SOAP12 = 'SOAP12',
}

export const SOAP_NAMESPACES = {
  SOAP11_ENVELOPE: 'http://schemas.xmlsoap.org/soap/envelope/',
  SOAP12_ENVELOPE: 'http://www.w3.org/2003/05/soap-envelope',
  SOAP11_ENCODING: 'http://schemas.xmlsoap.org/soap/encoding/',
  SOAP12_ENCODING: 'http://www.w3.org/2003/05/soap-encoding',
  WSDL11_SOAP11: 'http://schemas.xmlsoap.org/wsdl/soap/',
  WSDL11_SOAP12: 'http://schemas.xmlsoap.org/wsdl/soap12/',
  XSI: 'http://www.w3.org/2001/XMLSchema-instance',
  XSD: 'http://www.w3.org/2001/XMLSchema',
} as const;

export const ENVELOPE_NAMESPACE: Readonly<Record<SoapVersion, string>> = {
  [SoapVersion.SOAP11]: SOAP_NAMESPACES.SOAP11_ENVELOPE,
  [SoapVersion.SOAP12]: SOAP_NAMESPACES.SOAP12_ENVELOPE,
};

export function isSoapVersion(value: unknown): value is SoapVersion {
  return value === SoapVersion.SOAP11 || value === SoapVersion.SOAP12;
}

/**
 * The registered-protocols table: envelope namespace → protocol version.
 * The dispatcher only accepts envelopes whose namespace is listed here.
 */
export class ProtocolTable {
  private readonly byNamespace = new Map<string, SoapVersion>();

  constructor(versions: Iterable<SoapVersion> = [SoapVersion.SOAP11, SoapVersion.SOAP12]) {
    for (const version of versions) {
      this.byNamespace.set(ENVELOPE_NAMESPACE[version], version);
    }
  }

  fromEnvelope(namespaceURI: string): SoapVersion | undefined {
    return this.byNamespace.get(namespaceURI);
  }

  versions(): SoapVersion[] {
    return [...new Set(this.byNamespace.values())].sort();
  }
}

/**
 * Content type for a response in the given version.
 */
export function getSoapContentType(version: SoapVersion, soapAction?: string): string {
  if (version === SoapVersion.SOAP11) {
    return 'text/xml; charset=utf-8';
  }
  return soapAction
    ? `application/soap+xml; charset=utf-8; action="${soapAction}"`
    : 'application/soap+xml; charset=utf-8';
}
