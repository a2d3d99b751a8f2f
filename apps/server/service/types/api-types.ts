import type { Property } from "@unclaimed/core";

/**
 * A request to start a claim on a property.
 */
export type ClaimRequest = {
    propertyId: string;
    claimantName: string;
    claimantAddress: string;
    claimantEmail: string;
    claimantPhone?: string;
};

/**
 * Acknowledgement returned for an accepted claim request.
 */
export type ClaimAcknowledgement = {
    message: "Claim initiated";
    property: Property;
};

/**
 * Structured response from the request layer: the HTTP status code and the
 * JSON body to write.
 */
export type ApiResponse = {
    /** HTTP status code */
    statusCode: number;
    /** Response body payload */
    json: unknown;
    /** Media type of the body */
    contentType: string;
};
