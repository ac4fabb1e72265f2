import type { FunctionSignature } from "../analyzer/types.js";
import type { ReturnKind } from "./c-types.js";

/**
 * Synthesized stand-in for one external dependency
 */
export interface StubSpec {
  /** Stubbed function name */
  name: string;
  signature: FunctionSignature;
  /** Control struct typedef name, e.g. `stub_read_sensor_t` */
  controlType: string;
  /** Control struct instance, e.g. `stub_read_sensor` */
  controlVar: string;
  /** Members of the control struct, in declaration order */
  controlFields: string[];
  returnKind: ReturnKind;
  /** Initial return value as C text; undefined for void */
  returnValue: string | undefined;
  /** C source: typedef, instance, function */
  source: string;
}

export interface StubPlan {
  /** Signatures to stub, in first-call order */
  stubs: StubSpec[];
  /** Callee names with no usable signature */
  unresolved: string[];
}
