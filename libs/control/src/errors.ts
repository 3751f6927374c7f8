import type { ZodIssue } from "zod";

export class InvalidGainsError extends Error {
  constructor(readonly issues: ZodIssue[], message = "Invalid PID gains") {
    super(message);
    this.name = "InvalidGainsError";
  }
}
