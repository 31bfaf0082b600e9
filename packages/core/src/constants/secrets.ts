/**
 * Placeholder substituted for every value hidden by secret masking.
 * Display and alerting code match on this exact literal.
 */
export const MASKED_ATTRIBUTE_VALUE = "********";
