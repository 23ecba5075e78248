export const SECURITY_QUESTION_IDS = [
  "Q_PET",
  "Q_MOTHER_MAIDEN_NAME",
  "Q_FIRST_CAR",
  "Q_BIRTH_CITY",
] as const;

export type SecurityQuestionId = (typeof SECURITY_QUESTION_IDS)[number];

export const SECURITY_QUESTIONS: Readonly<Record<SecurityQuestionId, string>> = {
  Q_PET: "What is your pet's name?",
  Q_MOTHER_MAIDEN_NAME: "What is your mother's maiden name?",
  Q_FIRST_CAR: "What was your first car?",
  Q_BIRTH_CITY: "What city were you born in?",
};

export const isSecurityQuestionId = (
  value: string,
): value is SecurityQuestionId =>
  SECURITY_QUESTION_IDS.some((id) => id === value);

export const listSecurityQuestions = (): {
  id: SecurityQuestionId;
  prompt: string;
}[] => SECURITY_QUESTION_IDS.map((id) => ({ id, prompt: SECURITY_QUESTIONS[id] }));

/**
 * Canonical form of a free-text answer: NFKC, trimmed, inner whitespace runs
 * collapsed to one space, lower-cased. "  Rex " and "rex" hash identically.
 */
export const normalizeSecurityAnswer = (answer: string): string =>
  answer.normalize("NFKC").trim().replace(/\s+/g, " ").toLowerCase();
