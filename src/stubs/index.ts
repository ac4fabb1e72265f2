export { StubSynthesizer, planStubs, renderStubs, signatureKey } from "./synthesizer.js";
export type { StubSynthesizerOptions } from "./synthesizer.js";
export { returnKindOf, defaultReturnLiteral, declare, captureType } from "./c-types.js";
export type { ReturnKind } from "./c-types.js";
export type { StubPlan, StubSpec } from "./types.js";
