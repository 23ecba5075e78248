export class InvalidUsernameError extends Error {
  constructor(message = "Username is invalid") {
    super(message);
    this.name = "InvalidUsernameError";
  }
}

export class WeakPasswordError extends Error {
  constructor(
    message = "Password does not meet the password policy",
    public readonly problems: readonly string[] = [],
  ) {
    super(message);
    this.name = "WeakPasswordError";
  }
}

export class DuplicateUsernameError extends Error {
  constructor(message = "Username is already taken") {
    super(message);
    this.name = "DuplicateUsernameError";
  }
}

/** Unknown username and wrong secret both surface as this error. */
export class InvalidCredentialsError extends Error {
  constructor(message = "Invalid credentials") {
    super(message);
    this.name = "InvalidCredentialsError";
  }
}

/** Expired, forged, revoked and malformed tokens all surface as this error. */
export class UnauthorizedError extends Error {
  constructor(message = "Unauthorized") {
    super(message);
    this.name = "UnauthorizedError";
  }
}
