// Intervention Template DTOs (packages/shared/src/dto/template.dto.ts)
// Endpoint: GET /catalog/templates

/**
 * A single step within an intervention.
 */
export interface Action {
  /** Category tag, e.g. "environment", "technique", "break" */
  type: string;

  /** Nominal duration in minutes (>= 0) */
  duration_minutes: number;

  /** Non-empty, user-facing instruction */
  description: string;

  priority?: number;
}

export interface FollowUpSpec {
  delay_minutes: number;
  type: string;
}

/**
 * Catalog entry. Every template carries at least one trigger tag and
 * at least one action.
 */
export interface InterventionTemplate {
  id: string;
  headline: string;
  triggers: string[];
  actions: Action[];
  follow_up: FollowUpSpec;
}
