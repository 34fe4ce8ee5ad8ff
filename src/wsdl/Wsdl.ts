/**
 * WSDL model: the operations a parsed WSDL offers, one definition per SOAP
 * binding operation.
 */

import { readFileSync } from 'fs';
import { SoapVersion } from '../soap/ProtocolVersion.js';
import { packType } from '../xml/XmlElement.js';
import { parseWsdlContent } from './WsdlParser.js';
import type { ParsedWsdl, WsdlBinding, WsdlMessageRef, WsdlOperation, WsdlPortTypeOperation } from './WsdlParser.js';

export type OperationStyle = 'document' | 'rpc';

export interface OperationDefinition {
  name: string;
  soapVersion: SoapVersion;
  soapAction?: string;
  wsaAction: { input?: string; output?: string };
  /** Body element of the request, `{ns}local` (document style) */
  inputElement?: string;
  /** Body element of the answer, `{ns}local` (document style) */
  outputElement?: string;
  style: OperationStyle;
  /** Namespace for elements the WSDL leaves unnamed (rpc wrappers, default responses) */
  targetNamespace: string;
  binding: string;
  service?: string;
  port?: string;
  location?: string;
}

/**
 * Anything that can list operations for the importer.
 */
export interface WsdlModel {
  operations(): OperationDefinition[];
}

export class Wsdl implements WsdlModel {
  constructor(readonly parsed: ParsedWsdl) {}

  static fromString(content: string): Wsdl {
    return new Wsdl(parseWsdlContent(content));
  }

  static fromFile(path: string): Wsdl {
    return Wsdl.fromString(readFileSync(path, 'utf-8'));
  }

  get targetNamespace(): string {
    return this.parsed.targetNamespace;
  }

  /**
   * Operations of all SOAP bindings. When two bindings of the same version
   * define the same operation name, the first one is listed.
   */
  operations(): OperationDefinition[] {
    const seen = new Set<string>();
    const definitions: OperationDefinition[] = [];

    for (const binding of this.parsed.bindings) {
      const version = binding.soapVersion;
      if (!version) continue;

      const portType = this.parsed.portTypes.find((pt) => pt.name === binding.portType);
      const endpoint = this.endpointFor(binding.name);

      for (const op of binding.operations) {
        const key = `${version} ${op.name}`;
        if (seen.has(key)) continue;
        seen.add(key);

        const abstract = portType?.operations.find((o) => o.name === op.name);
        definitions.push(this.define(version, binding, op, abstract, endpoint));
      }
    }

    return definitions;
  }

  private define(
    soapVersion: SoapVersion,
    binding: WsdlBinding,
    op: WsdlOperation,
    abstract: WsdlPortTypeOperation | undefined,
    endpoint: { service: string; port: string; location: string } | undefined
  ): OperationDefinition {
    const style: OperationStyle = (op.style ?? binding.style) === 'rpc' ? 'rpc' : 'document';

    const definition: OperationDefinition = {
      name: op.name,
      soapVersion,
      soapAction: op.soapAction,
      wsaAction: { input: abstract?.input?.wsaAction, output: abstract?.output?.wsaAction },
      style,
      targetNamespace: this.parsed.targetNamespace,
      binding: binding.name,
      service: endpoint?.service,
      port: endpoint?.port,
      location: endpoint?.location,
    };

    if (style === 'document') {
      definition.inputElement = this.elementOf(abstract?.input);
      definition.outputElement = this.elementOf(abstract?.output);
    } else if (op.inputNamespace) {
      definition.inputElement = packType(op.inputNamespace, op.name);
    }

    return definition;
  }

  /** Element of the first part of a referenced message */
  private elementOf(ref: WsdlMessageRef | undefined): string | undefined {
    if (!ref?.message) return undefined;
    const message = this.parsed.messages.find((m) => m.name === ref.message);
    return message?.parts[0]?.element;
  }

  private endpointFor(bindingName: string): { service: string; port: string; location: string } | undefined {
    for (const service of this.parsed.services) {
      const port = service.ports.find((p) => p.binding === bindingName);
      if (port) {
        return { service: service.name, port: port.name, location: port.location };
      }
    }
    return undefined;
  }
}
