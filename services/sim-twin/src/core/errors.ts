import type { ZodIssue } from "zod";

export class InvalidSimulationInputError extends Error {
  constructor(readonly issues: ZodIssue[], message = "Invalid roast simulation input") {
    super(message);
    this.name = "InvalidSimulationInputError";
  }
}
