/**
 * pagewise - Collection Domain
 * Ordered identity-keyed collection and append strategies
 */

export {
  createPaginatedCollection,
  byId,
  type PaginatedCollection,
  type PaginatedCollectionConfig,
} from "./paginated";

export {
  applyAppendStrategy,
  customAppend,
  type AppendStrategy,
  type CustomAppendFn,
  type CustomAppendStrategy,
} from "./strategy";
