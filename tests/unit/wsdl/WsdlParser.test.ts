import { describe, it, expect } from '@jest/globals';
import { readFileSync } from 'fs';
import { join } from 'path';
import { parseWsdlContent, WSDL_NAMESPACES } from '../../../src/wsdl/WsdlParser.js';
import { SoapVersion } from '../../../src/soap/ProtocolVersion.js';

const fixture = (name: string): string => readFileSync(join(__dirname, '../../fixtures', name), 'utf-8');

describe('parseWsdlContent', () => {
  describe('prefixed WSDL with two SOAP bindings', () => {
    const parsed = parseWsdlContent(fixture('info-service.wsdl'));

    it('should read the target namespace and namespace declarations', () => {
      expect(parsed.targetNamespace).toBe('urn:example:info');
      expect(parsed.namespaces['wsdl']).toBe(WSDL_NAMESPACES.WSDL11);
      expect(parsed.namespaces['tns']).toBe('urn:example:info');
    });

    it('should resolve message part elements to types', () => {
      expect(parsed.messages.map((m) => m.name)).toEqual([
        'getInfoRequest',
        'getInfoResponse',
        'setInfoRequest',
        'setInfoResponse',
      ]);
      expect(parsed.messages[0]?.parts).toEqual([{ name: 'parameters', element: '{urn:example:info}getInfo' }]);
    });

    it('should pick up WS-Addressing actions and documentation from the port type', () => {
      const [getInfo, setInfo] = parsed.portTypes[0]?.operations ?? [];

      expect(getInfo).toEqual({
        name: 'getInfo',
        input: { message: 'getInfoRequest', wsaAction: 'urn:example:info:getInfo' },
        output: { message: 'getInfoResponse', wsaAction: 'urn:example:info:getInfoResponse' },
        documentation: 'Look up the name for an id',
      });
      expect(setInfo?.input).toEqual({ message: 'setInfoRequest' });
      expect(setInfo?.documentation).toBeUndefined();
    });

    it('should tell the SOAP version of each binding by its extension namespace', () => {
      expect(parsed.bindings.map((b) => [b.name, b.soapVersion, b.portType])).toEqual([
        ['InfoSoap11Binding', SoapVersion.SOAP11, 'InfoPortType'],
        ['InfoSoap12Binding', SoapVersion.SOAP12, 'InfoPortType'],
      ]);
      expect(parsed.bindings[0]?.style).toBe('document');
      expect(parsed.bindings[0]?.transport).toBe('http://schemas.xmlsoap.org/soap/http');
    });

    it('should read soapAction per binding operation', () => {
      expect(parsed.bindings[0]?.operations.map((op) => [op.name, op.soapAction])).toEqual([
        ['getInfo', 'urn:example:info#getInfo'],
        ['setInfo', 'urn:example:info#setInfo'],
      ]);
      expect(parsed.bindings[1]?.operations.map((op) => op.soapAction)).toEqual(['urn:example:info#getInfo']);
    });

    it('should read service ports with their addresses', () => {
      expect(parsed.services).toEqual([
        {
          name: 'InfoService',
          ports: [
            { name: 'InfoSoap11Port', binding: 'InfoSoap11Binding', location: 'http://localhost:8081/info' },
            { name: 'InfoSoap12Port', binding: 'InfoSoap12Binding', location: 'http://localhost:8081/info12' },
          ],
        },
      ]);
    });
  });

  describe('WSDL in the default namespace', () => {
    const parsed = parseWsdlContent(fixture('rpc-service.wsdl'));

    it('should resolve part types against the declared prefixes', () => {
      expect(parsed.messages[0]?.parts).toEqual([
        { name: 'a', type: '{http://www.w3.org/2001/XMLSchema}int' },
        { name: 'b', type: '{http://www.w3.org/2001/XMLSchema}int' },
      ]);
    });

    it('should read rpc style and the soap:body namespace', () => {
      const rpc = parsed.bindings.find((b) => b.name === 'CalcRpcBinding');

      expect(rpc?.style).toBe('rpc');
      expect(rpc?.operations).toEqual([{ name: 'add', inputNamespace: 'urn:example:calc' }]);
    });

    it('should treat an empty soapAction as none', () => {
      const rpc = parsed.bindings.find((b) => b.name === 'CalcRpcBinding');

      expect(rpc?.operations[0]?.soapAction).toBeUndefined();
    });

    it('should leave the version of non-SOAP bindings undefined', () => {
      const http = parsed.bindings.find((b) => b.name === 'CalcHttpBinding');

      expect(http?.soapVersion).toBeUndefined();
      expect(http?.operations).toEqual([{ name: 'add' }]);
    });
  });

  it('should reject a document without definitions', () => {
    expect(() => parseWsdlContent('<types/>')).toThrow('Invalid WSDL: definitions element not found');
  });
});
