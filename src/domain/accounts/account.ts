import { type SecurityQuestionId } from "#/domain/accounts/security-question";

export interface Account {
  username: string;
  passwordHash: string;
  passwordSalt: string;
  securityQuestionId: SecurityQuestionId;
  securityAnswerHash: string;
  securityAnswerSalt: string;
  createdAt: Date;
}

export interface UsernamePolicy {
  minLength: number;
  maxLength: number;
}

export interface PasswordPolicy {
  minLength: number;
  requireLowercase: boolean;
  requireUppercase: boolean;
  requireDigit: boolean;
  requireSymbol: boolean;
}

// bcrypt ignores everything past 72 bytes.
export const PASSWORD_MAX_BYTES = 72;

const USERNAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const normalizeUsername = (username: string): string => username.trim();

/** Uniqueness key: usernames are unique case-insensitively, stored as typed. */
export const toUsernameKey = (username: string): string =>
  normalizeUsername(username).toLowerCase();

export const checkUsername = (
  username: string,
  policy: UsernamePolicy,
): string | null => {
  const value = normalizeUsername(username);
  if (!value) {
    return "Username is required";
  }
  if (value.length < policy.minLength) {
    return `Username must be at least ${policy.minLength} characters`;
  }
  if (value.length > policy.maxLength) {
    return `Username must be at most ${policy.maxLength} characters`;
  }
  if (!USERNAME_PATTERN.test(value)) {
    return "Username may contain only letters, digits, '.', '_' and '-', and must start with a letter or digit";
  }
  return null;
};

export const checkPasswordStrength = (
  password: string,
  policy: PasswordPolicy,
  context: { username?: string } = {},
): string[] => {
  const problems: string[] = [];

  if (password.length < policy.minLength) {
    problems.push(`Password must be at least ${policy.minLength} characters`);
  }
  if (new TextEncoder().encode(password).length > PASSWORD_MAX_BYTES) {
    problems.push(`Password must be at most ${PASSWORD_MAX_BYTES} bytes`);
  }
  if (policy.requireLowercase && !/[a-z]/.test(password)) {
    problems.push("Password must contain a lowercase letter");
  }
  if (policy.requireUppercase && !/[A-Z]/.test(password)) {
    problems.push("Password must contain an uppercase letter");
  }
  if (policy.requireDigit && !/[0-9]/.test(password)) {
    problems.push("Password must contain a digit");
  }
  if (policy.requireSymbol && !/[^A-Za-z0-9]/.test(password)) {
    problems.push("Password must contain a symbol");
  }
  if (
    context.username &&
    password.toLowerCase() === toUsernameKey(context.username)
  ) {
    problems.push("Password must not match the username");
  }

  return problems;
};
