/** Base class of every error raised by tokensmith. */
export class TokensmithError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised by `register` when a token definition is rejected. */
export class RegistrationError extends TokensmithError {}

export class DuplicateTokenError extends RegistrationError {
  readonly token: string;

  constructor(token: string) {
    super(`Token already registered: ${token}`);
    this.token = token;
  }
}

export class MissingFieldPatternError extends RegistrationError {
  readonly token: string;
  readonly field: string;

  constructor(token: string, field: string, reason: string) {
    super(`Field "${field}" of token ${token} has no pattern: ${reason}`);
    this.token = token;
    this.field = field;
  }
}

export class InvalidSubtypeLinkError extends RegistrationError {
  readonly token: string;
  readonly supertype: string;

  constructor(token: string, supertype: string) {
    super(`Token ${token} extends ${supertype}, which is not registered in this builder.`);
    this.token = token;
    this.supertype = supertype;
  }
}

export class UnknownTokenError extends TokensmithError {
  readonly token: string;

  constructor(token: string) {
    super(`Unknown token: ${token}`);
    this.token = token;
  }
}

/** Malformed template or a pattern the engine rejects after expansion. */
export class TemplateSyntaxError extends TokensmithError {}

export class CompileCycleError extends TokensmithError {
  readonly path: readonly string[];

  constructor(path: readonly string[]) {
    super(`Template expansion never terminates: ${path.join(" -> ")}`);
    this.path = path;
  }
}

/** A field's pattern accepted text that its parser rejects, or a required field is missing. */
export class ReconstructionError extends TokensmithError {}

export class UnknownOccurrenceError extends TokensmithError {
  readonly token: string;
  readonly index: number;

  constructor(token: string, index: number, available: number) {
    super(
      available === 0
        ? `Token ${token} does not occur in this pattern.`
        : `Token ${token} occurs ${available} time(s); occurrence ${index} requested.`,
    );
    this.token = token;
    this.index = index;
  }
}

export class RenderError extends TokensmithError {}
