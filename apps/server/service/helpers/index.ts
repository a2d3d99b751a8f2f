export * from "./batchLoader";
export * from "./fetcher";
export * from "./jsonapi";
export * from "./normalize";
export * from "./searchIndex";
