export type { AuthResult } from "#/application/use-cases/auth/authenticate-user.use-case";
export { AuthenticateUserUseCase } from "#/application/use-cases/auth/authenticate-user.use-case";
export { DummyCredential } from "#/application/use-cases/auth/dummy-credential";
export {
  DuplicateUsernameError,
  InvalidCredentialsError,
  InvalidUsernameError,
  UnauthorizedError,
  WeakPasswordError,
} from "#/application/use-cases/auth/errors";
export { GetCurrentAccountUseCase } from "#/application/use-cases/auth/get-current-account.use-case";
export type { SecurityQuestionView } from "#/application/use-cases/auth/get-security-question.use-case";
export { GetSecurityQuestionUseCase } from "#/application/use-cases/auth/get-security-question.use-case";
export type { LogoutMode, LogoutResult } from "#/application/use-cases/auth/logout-user.use-case";
export { LogoutUserUseCase } from "#/application/use-cases/auth/logout-user.use-case";
export { ResetPasswordUseCase } from "#/application/use-cases/auth/reset-password.use-case";
export type {
  AccountView,
  CredentialPolicy,
} from "#/application/use-cases/auth/signup-user.use-case";
export { SignupUserUseCase } from "#/application/use-cases/auth/signup-user.use-case";
export { ValidateSessionUseCase } from "#/application/use-cases/auth/validate-session.use-case";
