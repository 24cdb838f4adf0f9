import type { SpatialLevel } from '../constants/spatial-levels';

/** Metadata attached to every analytical response. */
export interface ResponseMetadata {
  /** Fact sources that contributed to the result. */
  sources: string[];
  generatedAt: string;
  periodFrom: string | null;
  periodTo: string | null;
  level: SpatialLevel;
  warnings: string[];
}

export interface ApiResponse<T> {
  data: T;
  meta: ResponseMetadata;
}

export interface ApiError {
  error: {
    code: string;
    message: string;
    retryable: boolean;
    details?: Array<{ field: string; message: string }>;
  };
}

export type ApiResult<T> = ApiResponse<T> | ApiError;
