export type SplitterErrorKind =
  | "InvalidTargetFormat"
  | "InvalidNumberFormat"
  | "InvalidSemantic"
  | "InvalidName"
  | "MemberNotFound"
  | "GroupNotFound"
  | "LogEntryNotFound";

export class SplitterError extends Error {
  readonly kind: SplitterErrorKind;

  constructor(kind: SplitterErrorKind, message: string) {
    super(message);
    this.name = "SplitterError";
    this.kind = kind;
  }
}

export class InvalidTargetFormatError extends SplitterError {
  constructor(message = "Please use the format <name>[:<number>[%]]") {
    super("InvalidTargetFormat", message);
    this.name = "InvalidTargetFormatError";
  }
}

export class InvalidNumberFormatError extends SplitterError {
  constructor(message = "Not a valid number") {
    super("InvalidNumberFormat", message);
    this.name = "InvalidNumberFormatError";
  }
}

export class InvalidSemanticError extends SplitterError {
  constructor(message: string) {
    super("InvalidSemantic", message);
    this.name = "InvalidSemanticError";
  }
}

export class InvalidNameError extends SplitterError {
  constructor(message: string) {
    super("InvalidName", message);
    this.name = "InvalidNameError";
  }
}

export class MemberNotFoundError extends SplitterError {
  constructor(message: string) {
    super("MemberNotFound", message);
    this.name = "MemberNotFoundError";
  }
}

export class GroupNotFoundError extends SplitterError {
  constructor(message = "The requested group could not be found") {
    super("GroupNotFound", message);
    this.name = "GroupNotFoundError";
  }
}

export class LogEntryNotFoundError extends SplitterError {
  constructor(message = "The requested log entry could not be found") {
    super("LogEntryNotFound", message);
    this.name = "LogEntryNotFoundError";
  }
}
