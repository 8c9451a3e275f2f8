export interface ApiError {
  code: string;
  message: string;
  requestId: string;
  fields?: Record<string, string>;
}

export interface ApiErrorResponse {
  error: ApiError;
}

export interface PaginatedResponse<T> {
  data: T[];
  page: number;
  limit: number;
  total: number;
}

export interface CursorPagedResponse<T> {
  object: "list";
  data: T[];
  has_more: boolean;
  next_cursor: string | null;
}

export interface PaginationParams {
  page: number;
  limit: number;
}

export interface Paginated<T> {
  items: T[];
  total: number;
}
