export { Bucket, type AcquireOptions } from './core/bucket.js';
export { Group } from './core/group.js';
export {
  KeyedHandlerCache,
  type HandlerFactory,
  type KeyedHandlerCacheOptions,
} from './core/keyed-handler-cache.js';
export { RateConfigError } from './core/errors.js';
export {
  UNLIMITED,
  Kb,
  Mb,
  Gb,
  Bps,
  Kbps,
  Mbps,
  Gbps,
  perSecond,
  perMinute,
  rate,
  parseRate,
  formatRate,
  isUnlimited,
  assertRate,
  type RateOpts,
  type LimitedRate,
  type UnlimitedRate,
} from './core/rate.js';
export {
  ThrottleStream,
  newReader,
  newWriter,
  type ThrottleStreamOptions,
} from './stream/throttle-stream.js';
export {
  limitResponse,
  limitHandler,
  groupHandler,
  limitByRequestIp,
  DEFAULT_REAP_DELAY_MS,
  type GroupRequestHandler,
} from './http/limit-handler.js';
export { groupByRequestIp, groupByPath } from './http/classify.js';
export type { RequestHandler, RequestClassifier } from './http/types.js';
