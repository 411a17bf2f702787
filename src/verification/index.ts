export * from "./result";
export * from "./session";
export * from "./extract";
export { VerificationService, type FunctionBody } from "./check";
export type { VerificationServiceAPI, VerificationServiceOptions } from "./types";
