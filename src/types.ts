export interface QueryRequest {
  /** URL of the document to answer from. */
  documents: string;
  questions: string[];
}

export interface QueryResponse {
  answers: string[];
}

export interface ValidationIssue {
  path?: string;
  message: string;
}

export interface ErrorResponse {
  error: string;
}

export interface ValidationErrorResponse {
  errors: ValidationIssue[];
}
