import {
  createSelector,
  optionalAttribute,
  requiredAttribute,
  requiredDateAttribute,
  textOf,
  xmlStringToDOM,
} from "./xml";

/**
 * A SAML response. Nothing in it can be trusted until its signature has been
 * verified against the IdP certificate; see verifySAMLResponse.
 */
export type Response = {
  readonly id: string;
  readonly signature: SignatureInfo | null;
  readonly assertion: Assertion;
};

/**
 * The enveloped signature on the response itself. Signatures placed only on
 * the inner assertion are not represented.
 */
export type SignatureInfo = {
  readonly value: string;
};

export type Assertion = {
  readonly issuer: string;
  readonly subject: Subject;
  readonly conditions: Conditions;
  readonly attributes: readonly Attribute[];
};

export type Subject = {
  readonly nameID: NameID;
  readonly subjectConfirmation: SubjectConfirmation;
};

/**
 * The IdP's identifier for the user. Only unique within a single issuer.
 */
export type NameID = {
  readonly format: string;
  readonly value: string;
};

export type SubjectConfirmation = {
  readonly data: SubjectConfirmationData;
};

export type SubjectConfirmationData = {
  readonly recipient: string;
  readonly notOnOrAfter: Date;
};

export type Conditions = {
  readonly notBefore: Date;
  readonly notOnOrAfter: Date;
};

export type Attribute = {
  readonly name: string;
  readonly nameFormat: string;
  /** Text of the first AttributeValue, or "" when there is none. */
  readonly value: string;
  readonly values: readonly string[];
};

const RESPONSE = "/samlp:Response";
const ASSERTION = "/samlp:Response/saml:Assertion";
const ANY_RESPONSE = "//*[local-name()='Response']";
const ANY_ASSERTION = "//*[local-name()='Assertion']";

/**
 * Parses a decoded SAML response into its document model. Structure is
 * checked here; trust is not.
 */
export function parseResponse(xml: string): Response {
  const selector = createSelector(xmlStringToDOM(xml));

  const responseElement = selector.selectUnambiguousElement(
    RESPONSE,
    ANY_RESPONSE,
  );
  const assertionElement = selector.selectUnambiguousElement(
    ASSERTION,
    ANY_ASSERTION,
  );

  const signatureElement =
    createSelector(responseElement).selectOptionalSingleElement(
      "./ds:Signature",
    );

  return {
    id: requiredAttribute(responseElement, "ID"),
    signature: signatureElement ? parseSignature(signatureElement) : null,
    assertion: parseAssertion(assertionElement),
  };
}

function parseSignature(signatureElement: Element): SignatureInfo {
  const signatureValue = createSelector(
    signatureElement,
  ).selectOptionalSingleElement("./ds:SignatureValue");

  return {
    value: signatureValue ? textOf(signatureValue).trim() : "",
  };
}

function parseAssertion(assertionElement: Element): Assertion {
  const selector = createSelector(assertionElement);

  const issuer = selector.selectSingleElement("./saml:Issuer");
  const nameID = selector.selectSingleElement("./saml:Subject/saml:NameID");
  const confirmationData = selector.selectSingleElement(
    "./saml:Subject/saml:SubjectConfirmation/saml:SubjectConfirmationData",
  );
  const conditions = selector.selectSingleElement("./saml:Conditions");
  const attributeStatement = selector.selectOptionalSingleElement(
    "./saml:AttributeStatement",
  );

  return {
    issuer: textOf(issuer),
    subject: {
      nameID: {
        format: optionalAttribute(nameID, "Format"),
        value: textOf(nameID),
      },
      subjectConfirmation: {
        data: {
          recipient: requiredAttribute(confirmationData, "Recipient"),
          notOnOrAfter: requiredDateAttribute(confirmationData, "NotOnOrAfter"),
        },
      },
    },
    conditions: {
      notBefore: requiredDateAttribute(conditions, "NotBefore"),
      notOnOrAfter: requiredDateAttribute(conditions, "NotOnOrAfter"),
    },
    attributes: attributeStatement
      ? createSelector(attributeStatement)
          .selectElements("./saml:Attribute")
          .map(parseAttribute)
      : [],
  };
}

function parseAttribute(attributeElement: Element): Attribute {
  const values = createSelector(attributeElement)
    .selectElements("./saml:AttributeValue")
    .map(textOf);

  return {
    name: optionalAttribute(attributeElement, "Name"),
    nameFormat: optionalAttribute(attributeElement, "NameFormat"),
    value: values[0] ?? "",
    values,
  };
}
