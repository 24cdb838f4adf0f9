export type { ResponseMetadata, ApiResponse, ApiError, ApiResult } from './api';
