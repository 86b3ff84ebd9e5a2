/**
 * Deterministic detection of quiz requests, kept out of the teaching LLM call
 * so routing can be tested as plain branches.
 */

export const QUIZ_PHRASES = [
  "quiz me",
  "test me",
  "ready for quiz",
  "ready for the quiz",
  "ready for a quiz",
  "start quiz",
  "start the quiz",
  "take quiz",
  "take the quiz",
  "give me a quiz",
  "give me the quiz",
  "let's do the quiz",
  "test my knowledge",
  "i want a quiz",
  "i want the quiz",
];

// Short agreements count only when the tutor just offered a quiz
const AFFIRMATIVE_PHRASES = ["yes", "yeah", "yep", "sure", "ok", "okay", "let's do it", "ready", "go ahead"];

const QUIZ_OFFER_MARKERS = ["quiz", "test your knowledge"];

export const CANCEL_QUIZ_PHRASES = [
  "cancel quiz",
  "cancel the quiz",
  "stop quiz",
  "stop the quiz",
  "exit quiz",
  "exit the quiz",
  "quit quiz",
  "quit the quiz",
];

/**
 * Lowercase, straighten apostrophes, drop other punctuation and collapse spaces.
 */
export function normalizeUtterance(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .replace(/[^a-z0-9'\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function containsPhrase(normalized: string, phrase: string): boolean {
  return ` ${normalized} `.includes(` ${phrase} `);
}

function startsWithPhrase(normalized: string, phrase: string): boolean {
  return normalized === phrase || normalized.startsWith(`${phrase} `);
}

export function isQuizOffer(assistantText: string): boolean {
  const normalized = assistantText.toLowerCase();
  return QUIZ_OFFER_MARKERS.some((marker) => normalized.includes(marker));
}

/**
 * True when the utterance asks to start the quiz. An explicit quiz phrase wins
 * anywhere in the sentence; a bare agreement ("yes", "sure") only counts as a
 * reply to a quiz offer in the previous assistant message.
 */
export function detectQuizIntent(utterance: string, lastAssistantText?: string): boolean {
  const normalized = normalizeUtterance(utterance);
  if (!normalized) {
    return false;
  }

  if (QUIZ_PHRASES.some((phrase) => containsPhrase(normalized, phrase))) {
    return true;
  }

  if (lastAssistantText && isQuizOffer(lastAssistantText)) {
    return AFFIRMATIVE_PHRASES.some((phrase) => startsWithPhrase(normalized, phrase));
  }

  return false;
}

export function detectCancelQuiz(utterance: string): boolean {
  const normalized = normalizeUtterance(utterance);
  return CANCEL_QUIZ_PHRASES.some((phrase) => containsPhrase(normalized, phrase));
}
