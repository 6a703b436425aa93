export { EndpointClient, type EndpointClientOptions } from './sdk/client.js'
export { withSession } from './sdk/scoped.js'
export { loadCatalog, normalizeLegacyUrl, parseCatalog, readCatalogFile } from './sdk/catalog.js'
export { placeholdersOf, resolveUrl } from './sdk/resolver.js'
export { createLogger, type Logger, type LogLevel } from './sdk/logger.js'
export {
  AuthenticationError,
  CatalogFetchError,
  EndpointClientError,
  MissingParameterError,
  TooManyArgumentsError,
  UnknownEndpointError
} from './sdk/errors.js'
export {
  DEFAULT_CATALOG_URL,
  type Catalog,
  type EndpointArgs,
  type EndpointDescriptor,
  type FetchLike,
  type ParamMap,
  type ParamValue
} from './sdk/types.js'
