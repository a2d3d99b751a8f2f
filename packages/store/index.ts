export {
    PropertyStore,
    type PropertyRow,
    type StoreOptions,
    rowToProperty,
} from "./sqlite";
