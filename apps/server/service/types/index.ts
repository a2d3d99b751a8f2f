export * from "./api-types";
export * from "./jsonapi-types";
export * from "./loader-types";
