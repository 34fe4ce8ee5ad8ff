import { describe, it, expect, jest } from '@jest/globals';
import { isMatched } from '../../../src/daemon/HandlerResult.js';
import type { HandlerResult, Matched } from '../../../src/daemon/HandlerResult.js';
import { messageStructure, soapBody, soapHeader } from '../../../src/soap/MessageStructure.js';
import { ENVELOPE_NAMESPACE, SoapVersion } from '../../../src/soap/ProtocolVersion.js';
import { WSA_NAMESPACES } from '../../../src/soap/SoapBuilder.js';
import { DocumentLiteralCompiler, stubCallback } from '../../../src/wsdl/HandlerCompiler.js';
import type { OperationCallback, OperationRequest } from '../../../src/wsdl/HandlerCompiler.js';
import type { OperationDefinition } from '../../../src/wsdl/Wsdl.js';
import type { XmlElement } from '../../../src/xml/XmlElement.js';
import { parseXml } from '../../../src/xml/XmlParser.js';

const GET_INFO: OperationDefinition = {
  name: 'getInfo',
  soapVersion: SoapVersion.SOAP11,
  soapAction: 'urn:example:info#getInfo',
  wsaAction: { input: 'urn:example:info:getInfo', output: 'urn:example:info:getInfoResponse' },
  inputElement: '{urn:example:info}getInfo',
  outputElement: '{urn:example:info}getInfoResponse',
  style: 'document',
  targetNamespace: 'urn:example:info',
  binding: 'InfoSoap11Binding',
};

const ADD: OperationDefinition = {
  name: 'add',
  soapVersion: SoapVersion.SOAP11,
  wsaAction: {},
  style: 'rpc',
  targetNamespace: 'urn:example:calc',
  binding: 'CalcRpcBinding',
};

function invoke(
  definition: OperationDefinition,
  callback: OperationCallback,
  body: string,
  version = SoapVersion.SOAP11
): HandlerResult {
  const envelope = parseXml(
    `<s:Envelope xmlns:s="${ENVELOPE_NAMESPACE[version]}"><s:Body>${body}</s:Body></s:Envelope>`
  ).documentElement;
  const handler = new DocumentLiteralCompiler().compile(definition, callback);
  return handler(definition.name, envelope, messageStructure(envelope, version));
}

function answered(result: HandlerResult): Matched {
  if (!isMatched(result)) {
    throw new Error('handler declined the message');
  }
  return result;
}

/** First element inside the Body of the answer envelope */
function answerBody(result: Matched, version = SoapVersion.SOAP11): XmlElement | undefined {
  if (typeof result.payload === 'string') return undefined;
  return soapBody(result.payload.documentElement, version)?.elements()[0];
}

const REQUEST = '<i:getInfo xmlns:i="urn:example:info"><id>7</id></i:getInfo>';

describe('DocumentLiteralCompiler', () => {
  it('should hand the body element to the callback as a plain object', () => {
    const callback = jest.fn<OperationCallback>(() => ({ name: 'Alice' }));

    invoke(GET_INFO, callback, REQUEST);

    expect(callback).toHaveBeenCalledTimes(1);
    const request: OperationRequest | undefined = callback.mock.calls[0]?.[0];
    expect(request?.operation).toBe('getInfo');
    expect(request?.version).toBe(SoapVersion.SOAP11);
    expect(request?.data['id']).toBe('7');
    expect(request?.body.typeOf()).toBe('{urn:example:info}getInfo');
    expect(request?.definition).toBe(GET_INFO);
  });

  it('should wrap the answer in the output element', () => {
    const result = answered(invoke(GET_INFO, () => ({ name: 'Alice' }), REQUEST));

    expect(result.status).toBe(200);
    expect(result.statusText).toBe('OK');
    const element = answerBody(result);
    expect(element?.typeOf()).toBe('{urn:example:info}getInfoResponse');
    expect(element?.elements().map((e) => [e.localName, e.text])).toEqual([['name', 'Alice']]);
  });

  it('should add the WS-Addressing output action as a header', () => {
    const result = answered(invoke(GET_INFO, () => ({ name: 'Alice' }), REQUEST));
    if (typeof result.payload === 'string') throw new Error('expected an envelope');

    const action = soapHeader(result.payload.documentElement, SoapVersion.SOAP11)?.elements()[0];
    expect(action?.typeOf()).toBe(`{${WSA_NAMESPACES.WSA_2005}}Action`);
    expect(action?.textContent()).toBe('urn:example:info:getInfoResponse');
  });

  it('should decline a body element of another operation without calling back', () => {
    const callback = jest.fn<OperationCallback>(() => ({}));

    const result = invoke(GET_INFO, callback, '<i:setInfo xmlns:i="urn:example:info"/>');

    expect(result.kind).toBe('no-match');
    expect(callback).not.toHaveBeenCalled();
  });

  it('should decline an empty body', () => {
    expect(invoke(GET_INFO, () => ({}), '').kind).toBe('no-match');
  });

  it('should decline when the callback returns undefined', () => {
    expect(invoke(GET_INFO, () => undefined, REQUEST).kind).toBe('no-match');
  });

  it('should take status and text from the reserved keys', () => {
    const result = answered(
      invoke(GET_INFO, () => ({ _RETURN_CODE: 202, _RETURN_TEXT: 'Accepted', name: 'Bob' }), REQUEST)
    );

    expect(result.status).toBe(202);
    expect(result.statusText).toBe('Accepted');
    expect(answerBody(result)?.elements().map((e) => e.localName)).toEqual(['name']);
  });

  it('should turn a Fault answer into a SOAP 1.1 fault', () => {
    const result = answered(
      invoke(
        GET_INFO,
        () => ({ Fault: { faultcode: 'client.badId', faultstring: 'no such id', detail: { code: 'E42' } } }),
        REQUEST
      )
    );

    expect(result.status).toBe(500);
    expect(result.statusText).toBe('Internal Server Error');
    const fault = answerBody(result);
    expect(fault?.localName).toBe('Fault');
    expect(fault?.elements().map((e) => [e.localName, e.textContent()])).toEqual([
      ['faultcode', 'soap:Client.badId'],
      ['faultstring', 'no such id'],
      ['detail', 'E42'],
    ]);
  });

  it('should write faults in the version of the request', () => {
    const soap12 = { ...GET_INFO, soapVersion: SoapVersion.SOAP12 };
    const result = answered(
      invoke(soap12, () => ({ fault: { faultcode: 'server', faultstring: 'down' } }), REQUEST, SoapVersion.SOAP12)
    );

    const fault = answerBody(result, SoapVersion.SOAP12);
    expect(fault?.namespaceURI).toBe(ENVELOPE_NAMESPACE[SoapVersion.SOAP12]);
    expect(fault?.elements()[0]?.textContent()).toBe('soap:Receiver');
    expect(fault?.elements()[1]?.textContent()).toBe('down');
  });

  describe('without a declared input element', () => {
    it('should accept a body element named after the operation', () => {
      const callback = jest.fn<OperationCallback>(() => ({ sum: 5 }));

      const result = answered(invoke(ADD, callback, '<c:add xmlns:c="urn:other"><a>2</a><b>3</b></c:add>'));

      expect(callback.mock.calls[0]?.[0].data).toEqual({ a: '2', b: '3' });
      const element = answerBody(result);
      expect(element?.typeOf()).toBe('{urn:example:calc}addResponse');
      expect(element?.elements()[0]?.text).toBe('5');
    });
  });
});

describe('stubCallback', () => {
  it('should answer with the not implemented fault', () => {
    const result = answered(invoke(GET_INFO, stubCallback, REQUEST));

    expect(result.status).toBe(501);
    expect(result.statusText).toBe('not implemented');
    const fault = answerBody(result);
    expect(fault?.elements().map((e) => e.textContent())).toEqual([
      'soap:Server.notImplemented',
      'procedure getInfo for SOAP11 is not yet implemented',
    ]);
  });
});
