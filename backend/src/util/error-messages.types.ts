export interface ErrorResponse {
  error: string;
}
