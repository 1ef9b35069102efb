import { Data } from "effect";

export class InvalidAnalysisConfigError extends Data.TaggedError("InvalidAnalysisConfig")<{
  readonly message: string;
}> {}
