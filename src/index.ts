export { Api, type ApiOptions, type ServerTimeouts } from './api.js';
export {
  AlreadyInitializedError,
  ConfigError,
  EncodeError,
  FormParseError,
  NoResourceError,
  PayloadTooLargeError,
} from './errors.js';
export {
  bytes,
  respond,
  structured,
  text,
  type DeleteCapable,
  type DispatchResult,
  type GetCapable,
  type HeadCapable,
  type HeaderValues,
  type MaybePromise,
  type PatchCapable,
  type Payload,
  type PostCapable,
  type PutCapable,
  type Resource,
  type ResponseHeaders,
} from './resource/types.js';
export {
  isDeleteCapable,
  isGetCapable,
  isHeadCapable,
  isPatchCapable,
  isPostCapable,
  isPutCapable,
  resolveCapability,
  supportedVerbs,
  VERBS,
  type Verb,
} from './resource/capabilities.js';
export { ResourceRequest, DEFAULT_MAX_BODY_BYTES } from './resource/request.js';
export { parseForm, parseMediaType, parseUrlEncoded, type ParsedForm, type UploadedFile } from './connectors/form.js';
export { createDispatcher, type DispatchSettings } from './connectors/dispatch.js';
export {
  getRouteParams,
  PathRouter,
  type HandlerWrapper,
  type HttpHandler,
  type Router,
} from './connectors/router.js';
export { encodePayload, withDefaultContentType, type EncodedBody } from './codec/encode.js';
export { jsonCodec } from './codec/json.js';
export { msgpackCodec } from './codec/msgpack.js';
export { getCodecByName, listCodecs, registerCodec } from './codec/registry.js';
export type { Codec } from './codec/types.js';
export { defaultConfig, loadConfig, parseConfigFile, toApiOptions, type AppConfig } from './config/loader.js';
export { JsonlLog, type HttpLogEntry } from './log/jsonl.js';
export { compose } from './wrappers/compose.js';
export { parseCorsOrigins, withCors, type CorsConfig } from './wrappers/cors.js';
export { withRequestLog } from './wrappers/request-log.js';
export { WriteOnce } from './util/write-once.js';
