import { DOMParser } from "@xmldom/xmldom";
import * as xpath from "xpath";
import {
  Base64DecodeError,
  XMLExpectedOptionalSingletonError,
  XMLExpectedSingletonError,
  XMLExternalEntitiesForbiddenError,
  XMLParseError,
  XPathError,
} from "./errors";

export const NS = {
  md: "urn:oasis:names:tc:SAML:2.0:metadata",
  saml: "urn:oasis:names:tc:SAML:2.0:assertion",
  samlp: "urn:oasis:names:tc:SAML:2.0:protocol",
  ds: "http://www.w3.org/2000/09/xmldsig#",
} as const;

// Prefixes here belong to the XPath expressions, not to the documents:
// documents may bind any prefix (or none) to these namespaces.
const selector = xpath.useNamespaces(NS);

type SelectedValue = string | number | boolean | Node;

// All the DOM Node Types available in an XML document
// Ref: https://developer.mozilla.org/en-US/docs/Web/API/Node/nodeType
enum NODE_TYPE {
  STRING = "STRING",
  NUMBER = "NUMBER",
  BOOLEAN = "BOOLEAN",
  ELEMENT_NODE = "ELEMENT_NODE",
  ATTRIBUTE_NODE = "ATTRIBUTE_NODE",
  TEXT_NODE = "TEXT_NODE",
  CDATA_SECTION_NODE = "CDATA_SECTION_NODE",
  OTHER_NODE = "OTHER_NODE",
}

function getTypeofEl(el: SelectedValue | undefined): NODE_TYPE {
  if (typeof el === "string") {
    return NODE_TYPE.STRING;
  }
  if (typeof el === "number") {
    return NODE_TYPE.NUMBER;
  }
  if (typeof el === "boolean") {
    return NODE_TYPE.BOOLEAN;
  }
  if (el === undefined) {
    return NODE_TYPE.OTHER_NODE;
  }

  switch (el.nodeType) {
    case el.ELEMENT_NODE:
      return NODE_TYPE.ELEMENT_NODE;
    case el.ATTRIBUTE_NODE:
      return NODE_TYPE.ATTRIBUTE_NODE;
    case el.TEXT_NODE:
      return NODE_TYPE.TEXT_NODE;
    case el.CDATA_SECTION_NODE:
      return NODE_TYPE.CDATA_SECTION_NODE;
  }
  return NODE_TYPE.OTHER_NODE;
}

const attributesXPathTypeGuard = (
  values: SelectedValue[],
): values is Attr[] => {
  return values.every(
    (value) => getTypeofEl(value) === NODE_TYPE.ATTRIBUTE_NODE,
  );
};

const elementsXPathTypeGuard = (
  values: SelectedValue[],
): values is Element[] => {
  return values.every((value) => getTypeofEl(value) === NODE_TYPE.ELEMENT_NODE);
};

export class Selector {
  constructor(public dom: Node) {}

  private select = (xpath: string): SelectedValue[] => {
    const result = selector(xpath, this.dom) as SelectedValue | SelectedValue[];
    return Array.isArray(result) ? result : [result];
  };

  selectAttributes = (xpath: string): Attr[] => {
    const result = this.select(xpath);
    if (!attributesXPathTypeGuard(result)) {
      throw new XPathError(
        xpath,
        NODE_TYPE.ATTRIBUTE_NODE,
        getTypeofEl(result[0]),
      );
    }
    return result;
  };

  selectElements = (xpath: string): Element[] => {
    const result = this.select(xpath);
    if (!elementsXPathTypeGuard(result)) {
      throw new XPathError(
        xpath,
        NODE_TYPE.ELEMENT_NODE,
        getTypeofEl(result[0]),
      );
    }
    return result;
  };

  selectOptionalSingleElement = (xpath: string): Element | null => {
    const els = this.selectElements(xpath);
    if (els.length === 0) {
      return null;
    }
    if (els.length > 1) {
      throw new XMLExpectedOptionalSingletonError(
        xpath,
        NODE_TYPE.ELEMENT_NODE,
        els.length,
      );
    }
    return els[0];
  };

  selectSingleElement = (xpath: string): Element => {
    const els = this.selectElements(xpath);
    if (els.length != 1) {
      throw new XMLExpectedSingletonError(
        xpath,
        NODE_TYPE.ELEMENT_NODE,
        els.length,
      );
    }
    return els[0];
  };

  /**
   * Selects one element by its namespace-qualified path and checks that a
   * local-name search over the whole document finds that same element and
   * nothing else. A match hidden anywhere else in the document is treated as
   * structure manipulation.
   */
  selectUnambiguousElement = (
    strictXPath: string,
    liberalXPath: string,
  ): Element => {
    const strict = this.selectSingleElement(strictXPath);
    const liberal = this.selectElements(liberalXPath);
    if (liberal.length !== 1 || liberal[0] !== strict) {
      throw new XMLParseError(
        `found ${liberal.length} elements matching "${liberalXPath}" - potential structure manipulation`,
      );
    }
    return strict;
  };
}

export const createSelector = (dom: Node) => new Selector(dom);

export const textOf = (el: Element): string => el.textContent ?? "";

export const requiredAttribute = (el: Element, name: string): string => {
  const attr = el.getAttributeNode(name);
  if (!attr) {
    throw new XMLParseError(
      `${el.localName} element missing required ${name} attribute`,
    );
  }
  return attr.value;
};

export const optionalAttribute = (el: Element, name: string): string =>
  el.getAttributeNode(name)?.value ?? "";

const XS_DATE_TIME =
  /^-?\d{4,}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Reads an xs:dateTime attribute. Dates only hold whole milliseconds, so a
 * finer fraction is rounded up: comparing a millisecond `now` against the
 * rounded bound gives the same answer as against the exact one.
 */
export const requiredDateAttribute = (el: Element, name: string): Date => {
  const value = requiredAttribute(el, name);
  const match = XS_DATE_TIME.exec(value);
  const time = match ? Date.parse(value) : NaN;
  if (!match || Number.isNaN(time)) {
    throw new XMLParseError(
      `${el.localName} ${name} attribute is not a valid dateTime: ${value}`,
    );
  }
  const fraction = match[1] ?? "";
  const belowMillisecond = /[1-9]/.test(fraction.slice(4));
  return new Date(belowMillisecond ? time + 1 : time);
};

const BASE64 =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Strict standard-alphabet base64. Characters matched by `ignore` are removed
 * first; anything else outside the alphabet, or bad padding, is an error.
 */
export const decodeBase64 = (
  encoded: string,
  what: string,
  ignore: RegExp = /[\r\n]/g,
): Buffer => {
  const compact = encoded.replace(ignore, "");
  if (!BASE64.test(compact)) {
    throw new Base64DecodeError(what);
  }
  return Buffer.from(compact, "base64");
};

const XML_DECLARED_ENCODING = /^\uFEFF?<\?xml[^>]*\sencoding\s*=\s*["']([^"']*)["']/;

/**
 * Decodes a received document as UTF-8. Byte sequences that are not UTF-8,
 * or a declaration naming any other encoding, are parse errors rather than
 * being replaced or reinterpreted.
 */
export const decodeUTF8 = (bytes: Uint8Array): string => {
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    throw new XMLParseError("document is not valid UTF-8");
  }

  const declared = XML_DECLARED_ENCODING.exec(text)?.[1];
  if (declared !== undefined && !/^utf-?8$/i.test(declared)) {
    throw new XMLParseError(`unsupported document encoding: ${declared}`, {
      encoding: declared,
    });
  }
  return text;
};

/**
 * Block DOCTYPE declarations outright before the parser sees them
 */
function performStringLevelValidation(xmlString: string): void {
  // Check for entity attacks first (more specific)
  if (xmlString.includes("<!ENTITY")) {
    throw new XMLExternalEntitiesForbiddenError();
  }

  if (xmlString.includes("<!DOCTYPE")) {
    throw new XMLParseError("DOCTYPE detected and blocked");
  }
}

// Deeper than any SAML document legitimately gets
export const MAX_ELEMENT_DEPTH = 256;

/**
 * Manually traverse all nodes to block forbidden node types
 */
function blockForbiddenNodes(document: Document): void {
  if (document.doctype) {
    throw new XMLParseError("Payload contains doctype");
  }

  function checkNode(currentNode: Node): void {
    switch (currentNode.nodeType) {
      case currentNode.COMMENT_NODE:
        throw new XMLParseError("document contained illegal XML comments", {
          comment: currentNode.nodeValue,
          location: currentNode.parentNode?.nodeName || "unknown",
        });

      case currentNode.PROCESSING_INSTRUCTION_NODE:
        // Allow processing instructions only at document level (like XML declaration)
        if (
          currentNode.parentNode &&
          currentNode.parentNode.nodeType !== currentNode.DOCUMENT_NODE
        ) {
          throw new XMLParseError(
            "document contained illegal processing instructions",
            {
              processingInstruction: currentNode.nodeValue,
              location: currentNode.parentNode.nodeName,
            },
          );
        }
        break;

      case currentNode.DOCUMENT_TYPE_NODE:
        throw new XMLParseError("Document type nodes are forbidden");

      case currentNode.ENTITY_NODE:
      case currentNode.ENTITY_REFERENCE_NODE:
        throw new XMLExternalEntitiesForbiddenError();

      case currentNode.NOTATION_NODE:
        throw new XMLParseError("Notation nodes are forbidden");

      case currentNode.ELEMENT_NODE:
      case currentNode.ATTRIBUTE_NODE:
      case currentNode.TEXT_NODE:
      case currentNode.CDATA_SECTION_NODE:
      case currentNode.DOCUMENT_NODE:
      case currentNode.DOCUMENT_FRAGMENT_NODE:
        break;

      default:
        throw new XMLParseError(
          `Unknown or forbidden node type: ${currentNode.nodeType}`,
        );
    }
  }

  // Iterative walk; nesting depth never reaches the call stack
  const pending: { node: Node; depth: number }[] = [{ node: document, depth: 0 }];
  for (let entry = pending.pop(); entry; entry = pending.pop()) {
    const { node, depth } = entry;
    checkNode(node);

    if (node.nodeType === node.ELEMENT_NODE && depth > MAX_ELEMENT_DEPTH) {
      throw new XMLParseError(
        `document is nested deeper than ${MAX_ELEMENT_DEPTH} elements`,
      );
    }

    // XMLDOM leaves childNodes null on leaf nodes, whatever the DOM typings say
    const children: NodeListOf<ChildNode> | null = node.childNodes;
    if (children) {
      for (let i = children.length - 1; i >= 0; i--) {
        pending.push({ node: children[i], depth: depth + 1 });
      }
    }
  }
}

/**
 * Parses an untrusted XML document. DOCTYPEs, entities, comments and
 * processing instructions below the prolog are rejected.
 */
export const xmlStringToDOM = (xmlDocString: string): Document => {
  performStringLevelValidation(xmlDocString);

  // Throwing from the handler makes XMLDOM re-throw immediately instead of
  // recovering and building a partial document
  const bailImmediately = (msg: string): never => {
    throw new Error(msg);
  };

  const parser = new DOMParser({
    // Gives better error messages in the underlying lib
    locator: {},
    errorHandler: {
      // XMLDOM only warns about mismatched end tags and broken attributes
      warning: bailImmediately,
      error: bailImmediately,
      fatalError: bailImmediately,
    },
  });

  let document: Document;
  try {
    document = parser.parseFromString(xmlDocString, "application/xml");
  } catch (e: unknown) {
    coerceXMLDOMError(e);
  }

  blockForbiddenNodes(document);
  return document;
};

function coerceXMLDOMError(err: unknown): never {
  if (!(err instanceof Error)) {
    throw err;
  }

  // Known XMLDOM messages, from its errorHandler.error and
  // errorHandler.fatalError call sites

  if (err.message.includes("entity not found:")) {
    throw new XMLExternalEntitiesForbiddenError();
  }

  if (err.message.includes("invalid doc source")) {
    throw new XMLParseError("document is empty");
  }
  if (err.message.includes("unexpected end of input")) {
    throw new XMLParseError(
      "found unexpected end of input while evaluating XML",
    );
  }
  if (err.message.includes("Unclosed comment")) {
    throw new XMLParseError(
      "found unexpected unclosed comment while evaluating XML",
    );
  }
  if (err.message.includes("end tag name")) {
    throw new XMLParseError("found mismatched tag names while evaluating XML");
  }
  if (/Attribute .* redefined/.test(err.message)) {
    throw new XMLParseError("found duplicate attribute while evaluating XML");
  }

  if (err.message.includes("[xmldom warning]")) {
    throw new XMLParseError("found malformed markup while evaluating XML");
  }

  console.error("[XML VALIDATION] invalid XML:", err);
  throw new XMLParseError("could not parse XML");
}
