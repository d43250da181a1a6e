import { XMLParseError } from "./errors";
import {
  createSelector,
  optionalAttribute,
  requiredAttribute,
  textOf,
  xmlStringToDOM,
} from "./xml";

/**
 * Identity Provider metadata, as published by the IdP and uploaded by an
 * administrator when a trust relationship is set up.
 */
export type EntityDescriptor = {
  readonly entityID: string;
  readonly idpSSODescriptor: IDPSSODescriptor;
};

export type IDPSSODescriptor = {
  readonly keyDescriptor: KeyDescriptor;
  readonly singleSignOnServices: readonly SingleSignOnService[];
};

export type KeyDescriptor = {
  /** Base64 DER, exactly as it appears in ds:X509Certificate. */
  readonly certificate: string;
};

export type SingleSignOnService = {
  readonly binding: string;
  readonly location: string;
};

/**
 * Parses an IdP metadata document. Only a single EntityDescriptor is
 * accepted, not an EntitiesDescriptor aggregate.
 */
export function parseEntityDescriptor(xml: string): EntityDescriptor {
  const selector = createSelector(xmlStringToDOM(xml));

  const entityDescriptor = selector.selectUnambiguousElement(
    "/md:EntityDescriptor",
    "//*[local-name()='EntityDescriptor']",
  );
  const idpSSODescriptor = createSelector(
    entityDescriptor,
  ).selectSingleElement("./md:IDPSSODescriptor");

  return {
    entityID: requiredAttribute(entityDescriptor, "entityID"),
    idpSSODescriptor: parseIDPSSODescriptor(idpSSODescriptor),
  };
}

function parseIDPSSODescriptor(descriptor: Element): IDPSSODescriptor {
  const selector = createSelector(descriptor);

  return {
    keyDescriptor: parseKeyDescriptor(
      selector.selectElements("./md:KeyDescriptor"),
    ),
    singleSignOnServices: selector
      .selectElements("./md:SingleSignOnService")
      .map((service) => ({
        binding: requiredAttribute(service, "Binding"),
        location: requiredAttribute(service, "Location"),
      })),
  };
}

// A KeyDescriptor without a use attribute is valid for both signing and
// encryption; one marked "encryption" is never used to check signatures.
function parseKeyDescriptor(keyDescriptors: Element[]): KeyDescriptor {
  const signing = keyDescriptors.find((keyDescriptor) => {
    const use = optionalAttribute(keyDescriptor, "use");
    return use === "" || use === "signing";
  });
  if (!signing) {
    throw new XMLParseError("IDPSSODescriptor has no signing KeyDescriptor");
  }

  const certificates = createSelector(signing).selectElements(
    "./ds:KeyInfo/ds:X509Data/ds:X509Certificate",
  );
  if (certificates.length === 0) {
    throw new XMLParseError("KeyDescriptor has no X509Certificate");
  }

  return { certificate: textOf(certificates[0]) };
}
