import { X509Certificate } from "node:crypto";
import * as selfsigned from "selfsigned";
import { SignedXml } from "xml-crypto";

export const T0 = new Date("2030-01-01T00:00:00.000Z");

export const minutesAfterT0 = (minutes: number): Date =>
  new Date(T0.getTime() + minutes * 60 * 1000);

export const ISSUER = "idp-a";
export const RECIPIENT = "https://sp.example/acs";
export const NAME_ID = "user-1234@idp-a.example";

export const EXC_C14N = "http://www.w3.org/2001/10/xml-exc-c14n#";
export const ENVELOPED_SIGNATURE =
  "http://www.w3.org/2000/09/xmldsig#enveloped-signature";
export const RSA_SHA256 = "http://www.w3.org/2001/04/xmldsig-more#rsa-sha256";
export const SHA256 = "http://www.w3.org/2001/04/xmlenc#sha256";

export type SigningKeys = {
  privateKey: string;
  certificate: X509Certificate;
  /** Base64 DER, as it would appear in IdP metadata. */
  certificateBase64: string;
};

// Throwaway key pair for tests only
export function generateSigningKeys(): SigningKeys {
  const pems = selfsigned.generate([{ name: "commonName", value: "test-idp" }], {
    keySize: 2048,
    algorithm: "sha256",
    days: 1,
  });
  const certificate = new X509Certificate(pems.cert);
  return {
    privateKey: pems.private,
    certificate,
    certificateBase64: certificate.raw.toString("base64"),
  };
}

export type AttributeFixture = {
  name: string;
  nameFormat?: string;
  values: string[];
};

export type ResponseFixture = {
  issuer?: string;
  recipient?: string;
  nameID?: string;
  notBefore?: Date;
  notOnOrAfter?: Date;
  subjectNotOnOrAfter?: Date;
  attributes?: AttributeFixture[];
};

const attributeXML = ({ name, nameFormat, values }: AttributeFixture) =>
  `<saml:Attribute Name="${name}"${
    nameFormat ? ` NameFormat="${nameFormat}"` : ""
  }>${values
    .map((value) => `<saml:AttributeValue>${value}</saml:AttributeValue>`)
    .join("")}</saml:Attribute>`;

/**
 * An unsigned response: issuer idp-a, recipient https://sp.example/acs,
 * valid from T0 to T0+5m unless overridden.
 */
export function buildResponseXML(fixture: ResponseFixture = {}): string {
  const issuer = fixture.issuer ?? ISSUER;
  const recipient = fixture.recipient ?? RECIPIENT;
  const nameID = fixture.nameID ?? NAME_ID;
  const notBefore = (fixture.notBefore ?? T0).toISOString();
  const notOnOrAfter = (fixture.notOnOrAfter ?? minutesAfterT0(5)).toISOString();
  const subjectNotOnOrAfter = (
    fixture.subjectNotOnOrAfter ?? minutesAfterT0(5)
  ).toISOString();
  const attributes = fixture.attributes ?? [
    {
      name: "email",
      nameFormat: "urn:oasis:names:tc:SAML:2.0:attrname-format:basic",
      values: ["user@idp-a.example"],
    },
  ];

  return (
    `<samlp:Response xmlns:samlp="urn:oasis:names:tc:SAML:2.0:protocol" xmlns:saml="urn:oasis:names:tc:SAML:2.0:assertion" ID="_response-1" Version="2.0" IssueInstant="${T0.toISOString()}" Destination="${recipient}">` +
    `<saml:Issuer>${issuer}</saml:Issuer>` +
    `<samlp:Status><samlp:StatusCode Value="urn:oasis:names:tc:SAML:2.0:status:Success"/></samlp:Status>` +
    `<saml:Assertion ID="_assertion-1" Version="2.0" IssueInstant="${T0.toISOString()}">` +
    `<saml:Issuer>${issuer}</saml:Issuer>` +
    `<saml:Subject>` +
    `<saml:NameID Format="urn:oasis:names:tc:SAML:1.1:nameid-format:emailAddress">${nameID}</saml:NameID>` +
    `<saml:SubjectConfirmation Method="urn:oasis:names:tc:SAML:2.0:cm:bearer">` +
    `<saml:SubjectConfirmationData NotOnOrAfter="${subjectNotOnOrAfter}" Recipient="${recipient}"/>` +
    `</saml:SubjectConfirmation>` +
    `</saml:Subject>` +
    `<saml:Conditions NotBefore="${notBefore}" NotOnOrAfter="${notOnOrAfter}"/>` +
    `<saml:AttributeStatement>${attributes.map(attributeXML).join("")}</saml:AttributeStatement>` +
    `</saml:Assertion>` +
    `</samlp:Response>`
  );
}

/**
 * Signs the element matched by `target` with an enveloped signature placed
 * right after its Issuer.
 */
export function signXML(
  xml: string,
  privateKey: string,
  target: "Response" | "Assertion" = "Response",
): string {
  const element =
    target === "Response"
      ? "/*[local-name(.)='Response']"
      : "/*[local-name(.)='Response']/*[local-name(.)='Assertion']";

  const signer = new SignedXml({
    privateKey,
    canonicalizationAlgorithm: EXC_C14N,
    signatureAlgorithm: RSA_SHA256,
  });
  signer.addReference({
    xpath: element,
    digestAlgorithm: SHA256,
    transforms: [ENVELOPED_SIGNATURE, EXC_C14N],
  });
  signer.computeSignature(xml, {
    prefix: "ds",
    location: {
      reference: `${element}/*[local-name(.)='Issuer']`,
      action: "after",
    },
  });
  return signer.getSignedXml();
}

export const toBase64 = (xml: string): string =>
  Buffer.from(xml, "utf8").toString("base64");

export type MetadataFixture = {
  entityID?: string;
  certificate: string;
  services: { binding: string; location: string }[];
};

export function buildMetadataXML({
  entityID = ISSUER,
  certificate,
  services,
}: MetadataFixture): string {
  return (
    `<md:EntityDescriptor xmlns:md="urn:oasis:names:tc:SAML:2.0:metadata" entityID="${entityID}">` +
    `<md:IDPSSODescriptor protocolSupportEnumeration="urn:oasis:names:tc:SAML:2.0:protocol">` +
    `<md:KeyDescriptor use="signing">` +
    `<ds:KeyInfo xmlns:ds="http://www.w3.org/2000/09/xmldsig#"><ds:X509Data><ds:X509Certificate>${certificate}</ds:X509Certificate></ds:X509Data></ds:KeyInfo>` +
    `</md:KeyDescriptor>` +
    services
      .map(
        ({ binding, location }) =>
          `<md:SingleSignOnService Binding="${binding}" Location="${location}"/>`,
      )
      .join("") +
    `</md:IDPSSODescriptor>` +
    `</md:EntityDescriptor>`
  );
}
