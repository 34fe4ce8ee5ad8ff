import { describe, it, expect } from '@jest/globals';
import {
  buildSoapEnvelope,
  buildSoapFaultEnvelope,
  escapeXml,
  faultCodeFor,
  faultDocument,
  WSA_NAMESPACES,
} from '../../../src/soap/SoapBuilder.js';
import { SOAP_NAMESPACES, SoapVersion } from '../../../src/soap/ProtocolVersion.js';
import { parseXml } from '../../../src/xml/XmlParser.js';

const SOAP11 = SOAP_NAMESPACES.SOAP11_ENVELOPE;
const SOAP12 = SOAP_NAMESPACES.SOAP12_ENVELOPE;

describe('SoapBuilder', () => {
  describe('buildSoapEnvelope', () => {
    it('should build a SOAP 1.1 envelope by default', () => {
      expect(buildSoapEnvelope('<x/>')).toBe(
        `<soap:Envelope xmlns:soap="${SOAP11}"><soap:Body><x/></soap:Body></soap:Envelope>`
      );
    });

    it('should build a SOAP 1.2 envelope with extra namespaces', () => {
      const xml = buildSoapEnvelope('<t:x/>', { version: SoapVersion.SOAP12, namespaces: { t: 'urn:t' } });
      expect(xml).toBe(
        `<soap:Envelope xmlns:soap="${SOAP12}" xmlns:t="urn:t"><soap:Body><t:x/></soap:Body></soap:Envelope>`
      );
    });

    it('should add escaped text headers with version-specific attributes', () => {
      const xml = buildSoapEnvelope('', {
        version: SoapVersion.SOAP12,
        headers: [
          {
            namespace: WSA_NAMESPACES.WSA_2005,
            prefix: 'wsa',
            localName: 'Action',
            content: 'urn:a&b',
            mustUnderstand: true,
            actor: 'urn:next',
          },
        ],
      });
      expect(xml).toContain(
        `<soap:Header><wsa:Action xmlns:wsa="${WSA_NAMESPACES.WSA_2005}" soap:mustUnderstand="true" soap:role="urn:next">urn:a&amp;b</wsa:Action></soap:Header>`
      );
    });

    it('should write mustUnderstand as 1 in SOAP 1.1', () => {
      const xml = buildSoapEnvelope('', {
        headers: [{ localName: 'Token', content: '<v>1</v>', rawContent: true, mustUnderstand: true }],
      });
      expect(xml).toContain('<soap:Header><Token soap:mustUnderstand="1"><v>1</v></Token></soap:Header>');
    });
  });

  describe('faultCodeFor', () => {
    it('should map client and server per version', () => {
      expect(faultCodeFor('client', SoapVersion.SOAP11)).toBe('soap:Client');
      expect(faultCodeFor('server', SoapVersion.SOAP11)).toBe('soap:Server');
      expect(faultCodeFor('client', SoapVersion.SOAP12)).toBe('soap:Sender');
      expect(faultCodeFor('server.notImplemented', SoapVersion.SOAP12)).toBe('soap:Receiver.notImplemented');
    });

    it('should keep prefixed codes and pass unknown kinds through', () => {
      expect(faultCodeFor('env:VersionMismatch', SoapVersion.SOAP11)).toBe('env:VersionMismatch');
      expect(faultCodeFor('MustUnderstand', SoapVersion.SOAP12)).toBe('soap:MustUnderstand');
    });
  });

  describe('fault envelopes', () => {
    it('should build a SOAP 1.1 fault', () => {
      const xml = buildSoapFaultEnvelope({
        faultCode: 'client.UnknownMessage',
        faultString: 'a < b',
        faultActor: 'urn:me',
        detail: '<why>none</why>',
      });
      expect(xml).toBe(
        `<soap:Envelope xmlns:soap="${SOAP11}"><soap:Body><soap:Fault>` +
          '<faultcode>soap:Client.UnknownMessage</faultcode>' +
          '<faultstring>a &lt; b</faultstring>' +
          '<faultactor>urn:me</faultactor>' +
          '<detail><why>none</why></detail>' +
          '</soap:Fault></soap:Body></soap:Envelope>'
      );
    });

    it('should build a SOAP 1.2 fault with a subcode', () => {
      const doc = faultDocument({ faultCode: 'client.UnknownMessage', faultString: 'unknown' }, SoapVersion.SOAP12);
      const fault = doc.documentElement.firstChild(SOAP12, 'Body')?.firstChild(SOAP12, 'Fault');
      const code = fault?.firstChild(SOAP12, 'Code');

      expect(code?.firstChild(SOAP12, 'Value')?.text).toBe('soap:Sender');
      expect(code?.firstChild(SOAP12, 'Subcode')?.firstChild(SOAP12, 'Value')?.text).toBe('UnknownMessage');
      expect(fault?.firstChild(SOAP12, 'Reason')?.firstChild(SOAP12, 'Text')?.text).toBe('unknown');
      expect(fault?.firstChild(SOAP12, 'Reason')?.firstChild(SOAP12, 'Text')?.attribute('xml:lang')).toBe('en');
    });

    it('should produce a parsable document', () => {
      const doc = faultDocument({ faultCode: 'server', faultString: 'down' }, SoapVersion.SOAP11);
      expect(parseXml(doc.toString()).documentElement.typeOf()).toBe(`{${SOAP11}}Envelope`);
    });
  });

  it('should escape XML special characters', () => {
    expect(escapeXml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&apos;&amp;&apos;&lt;/a&gt;');
  });
});
