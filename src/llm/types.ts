/**
 * The two messages sent for one generation request.
 * Built fresh for every request and never stored.
 */
export interface PromptPayload {
  systemMessage: string;
  userMessage: string;
}

/** Generation parameters sent with every request. */
export interface SamplingParams {
  temperature: number;
  maxTokens: number;
  topP: number;
}

/** A worked example scene shown to the model when examples are enabled. */
export interface StyleExample {
  id: string;
  characters: string[];
  text: string;
}

/**
 * Optional prompt material beyond the required scene fields.
 */
export interface PromptExtras {
  /** Tags per character, rendered as character profile lines */
  characterTags?: Record<string, string[]>;

  /** Overall vibe hints from the general bucket */
  vibes?: string[];

  /** Free-text premise the caller typed alongside the setting */
  premise?: string;

  /** Candidate worked examples; the builder picks one */
  examples?: readonly StyleExample[];
}
