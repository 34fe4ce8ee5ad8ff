export {
  XmlElement,
  XmlDocument,
  packType,
  unpackType,
  splitQName,
  isRecord,
  XML_NAMESPACE,
  XMLNS_NAMESPACE,
} from './XmlElement.js';
export type { XmlNode, NamespaceScope, OrderedXmlNode } from './XmlElement.js';
export { parseXml, decodeXml, detectXmlEncoding, XmlParseError } from './XmlParser.js';
