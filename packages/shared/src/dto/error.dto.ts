// Error DTOs (packages/shared/src/dto/error.dto.ts)

export interface ApiErrorDto {
  statusCode: number;
  message: string;
  error: string;
  /**
   * Included only for validation errors (400)
   */
  constraints?: string[];
}

/**
 * Status codes:
 * - 400 Bad Request: Validation failed, or neither persona nor persona_id given
 * - 404 Not Found: persona_id is not in the catalog
 * - 500 Internal Server Error: catalog or configuration is broken
 */
