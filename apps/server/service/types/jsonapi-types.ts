import type { Property } from "@unclaimed/core";

/**
 * JSON:API implementation information.
 */
export type JsonApiImplementation = {
    version: string;
};

/**
 * JSON:API links object.
 */
export type JsonApiLinks = {
    self?: string;
    [name: string]: string | undefined;
};

/**
 * JSON:API meta object.
 */
export type JsonApiMeta = Record<string, unknown>;

/**
 * JSON:API resource object.
 */
export type JsonApiResource<TAttributes> = {
    type: string;
    id: string;
    attributes: TAttributes;
    links?: JsonApiLinks;
};

/**
 * JSON:API error object.
 */
export type JsonApiError = {
    status: string;
    title: string;
    detail?: string;
    code?: string;
    source?: {
        pointer?: string;
        parameter?: string;
    };
};

/**
 * JSON:API error document.
 */
export type JsonApiErrorDocument = {
    jsonapi: JsonApiImplementation;
    errors: JsonApiError[];
    meta?: JsonApiMeta;
};

/**
 * Attributes of a property resource: the record without its id.
 */
export type PropertyAttributes = Omit<Property, "propertyId">;

/**
 * Document returned by a property search.
 */
export type PropertySearchDocument = {
    jsonapi: JsonApiImplementation;
    data: JsonApiResource<PropertyAttributes>[];
    links: JsonApiLinks;
    meta: JsonApiMeta;
};

/**
 * Document returned for a single property.
 */
export type PropertyDetailDocument = {
    jsonapi: JsonApiImplementation;
    data: JsonApiResource<PropertyAttributes>;
    links: JsonApiLinks;
};
