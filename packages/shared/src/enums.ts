// Shared Enums (packages/shared/src/enums.ts)

// ─────────────────────────────────────────────────────────────
// CONTEXT BUCKETS
// ─────────────────────────────────────────────────────────────

export enum TimeOfDay {
  MORNING = "morning",
  AFTERNOON = "afternoon",
  EVENING = "evening"
}

export enum EnergyLevel {
  HIGH = "high",
  MEDIUM = "medium",
  LOW = "low"
}

export enum TaskComplexity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high"
}

// ─────────────────────────────────────────────────────────────
// PERSONA ENUMS
// ─────────────────────────────────────────────────────────────

/**
 * How a persona prefers to take in new instructions.
 * Drives the structural rewrite of each action description.
 */
export enum LearningStyle {
  SYSTEMATIC = "systematic",
  EXPLORATORY = "exploratory"
}

/**
 * Tone used when addressing the user.
 */
export enum CommunicationPreference {
  DIRECT = "direct",
  ENTHUSIASTIC = "enthusiastic"
}

/**
 * deep_focus personas work in long uninterrupted blocks, so their
 * action durations are stretched.
 */
export enum WorkPattern {
  DEEP_FOCUS = "deep_focus",
  FLEXIBLE = "flexible"
}

// ─────────────────────────────────────────────────────────────
// TIMING ENUMS
// ─────────────────────────────────────────────────────────────

export enum TimingDecision {
  IMMEDIATE = "immediate",
  NEXT_BREAK = "next_break",
  DEFER = "defer",
  SKIP = "skip"
}

export enum NudgeIntensity {
  SUBTLE = "subtle",
  MODERATE = "moderate",
  STRONG = "strong"
}

/**
 * What the user did with a delivered nudge.
 */
export enum NudgeOutcome {
  ACCEPTED = "accepted",
  DISMISSED = "dismissed"
}
