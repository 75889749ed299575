// src/lib/api/index.ts

export { sendJson, bearer, joinUrl } from './base';

export type { FetchFn, JsonRequestOptions } from './base';

export { ApiResponse } from './response';

export { ApiError, NetworkError, MissingTokenError, ConfigError } from './errors';
