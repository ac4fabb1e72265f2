/**
 * Regeneration Controller
 *
 * Finite state machine driving generate -> validate -> classify for one
 * target function, with a hard ceiling of maxRegenerationAttempts + 1
 * attempts.
 *
 *   pending -> attempting -> evaluating -> accepted
 *                  ^             |
 *                  +-------------+ (below threshold, regeneration on)
 *
 * Terminal states: accepted, exhausted_warn (best attempt kept, degraded),
 * exhausted_fail (strict rejection, no usable attempt, or aborted).
 */

import type { GenerationProvider } from "../ai/types.js";
import { CTestGenError, ProviderError, toError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import { blockingIssueCount, compareTiers, meetsThreshold } from "./classifier.js";
import { createFeedbackBundle } from "./feedback.js";
import { buildGenerationPrompt, generateCandidate, postProcessCandidate } from "./generator.js";
import type { PromptOptions } from "./generator.js";
import type {
  ControllerResult,
  ControllerState,
  FeedbackBundle,
  GenerationAttempt,
  QualityTier,
  TerminalState,
  TestContext,
  ValidationResult,
} from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * What the controller needs from a validator
 */
export interface CandidateValidator {
  validate(candidate: string, ctx: TestContext): Promise<ValidationResult>;
}

export interface ControllerOptions {
  qualityThreshold: QualityTier;
  regenerateOnLowQuality: boolean;
  maxRegenerationAttempts: number;
  providerTimeoutMs: number;
  prompt: PromptOptions;
  /** Run-level cancellation; results arriving after abort are discarded */
  signal?: AbortSignal;
}

export class IllegalTransitionError extends CTestGenError {
  constructor(
    public readonly from: ControllerState,
    public readonly to: ControllerState
  ) {
    super(`Illegal controller transition: ${from} -> ${to}`, "ILLEGAL_TRANSITION", { from, to });
    this.name = "IllegalTransitionError";
  }
}

// =============================================================================
// STATE MACHINE
// =============================================================================

/**
 * attempting -> attempting is a provider failure being retried;
 * * -> exhausted_fail from a non-terminal state covers abort.
 */
export const TRANSITIONS: Readonly<Record<ControllerState, readonly ControllerState[]>> = {
  pending: ["attempting", "exhausted_fail"],
  attempting: ["evaluating", "attempting", "exhausted_warn", "exhausted_fail"],
  evaluating: ["accepted", "attempting", "exhausted_warn", "exhausted_fail"],
  accepted: [],
  exhausted_warn: [],
  exhausted_fail: [],
};

class StateMachine {
  private current: ControllerState = "pending";
  readonly history: ControllerState[] = ["pending"];

  get state(): ControllerState {
    return this.current;
  }

  transition(to: ControllerState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    this.current = to;
    this.history.push(to);
  }
}

/**
 * Best attempt: higher tier, then fewer blocking issues, then earliest
 */
export function selectBestAttempt(attempts: readonly GenerationAttempt[]): GenerationAttempt | undefined {
  let best: GenerationAttempt | undefined;
  for (const attempt of attempts) {
    const validation = attempt.validation;
    if (!validation) continue;
    if (!best?.validation) {
      best = attempt;
      continue;
    }
    const byTier = compareTiers(validation.tier, best.validation.tier);
    if (byTier > 0 || (byTier === 0 && blockingIssueCount(validation) < blockingIssueCount(best.validation))) {
      best = attempt;
    }
  }
  return best;
}

// =============================================================================
// CONTROLLER
// =============================================================================

export class RegenerationController {
  private readonly log = logger.child("Controller");

  constructor(
    private readonly provider: GenerationProvider,
    private readonly validator: CandidateValidator,
    private readonly options: ControllerOptions
  ) {}

  /**
   * Total attempts allowed, first attempt included
   */
  get attemptBudget(): number {
    return Math.max(0, this.options.maxRegenerationAttempts) + 1;
  }

  async run(ctx: TestContext): Promise<ControllerResult> {
    const machine = new StateMachine();
    const attempts: GenerationAttempt[] = [];
    const name = ctx.target.name;
    let feedback: FeedbackBundle | undefined;

    const finish = (
      state: TerminalState,
      selected: GenerationAttempt | undefined,
      error?: string
    ): ControllerResult => {
      machine.transition(state);
      this.log.debug(`${name}: ${machine.history.join(" -> ")}`);
      return {
        target: ctx.target,
        finalState: state,
        attempts,
        selected,
        tier: selected?.validation?.tier,
        accepted: state !== "exhausted_fail",
        degraded: state === "exhausted_warn",
        history: [...machine.history],
        error,
      };
    };

    const aborted = (): boolean => this.options.signal?.aborted === true;

    if (aborted()) {
      return finish("exhausted_fail", undefined, "aborted");
    }
    machine.transition("attempting");

    for (let number = 1; number <= this.attemptBudget; number++) {
      const prompt = buildGenerationPrompt(ctx, this.options.prompt, feedback);
      const attempt: GenerationAttempt = {
        number,
        prompt,
        candidate: undefined,
        outcome: "pending",
        validation: undefined,
        error: undefined,
      };
      attempts.push(attempt);

      let validation: ValidationResult;
      try {
        const raw = await generateCandidate(this.provider, prompt, { timeoutMs: this.options.providerTimeoutMs });
        if (aborted()) {
          return finish("exhausted_fail", undefined, "aborted");
        }

        attempt.candidate = postProcessCandidate(raw, ctx);
        machine.transition("evaluating");

        validation = await this.validator.validate(attempt.candidate, ctx);
        if (aborted()) {
          return finish("exhausted_fail", undefined, "aborted");
        }
      } catch (error) {
        if (aborted()) {
          return finish("exhausted_fail", undefined, "aborted");
        }

        attempt.outcome = "failed";

        if (!(error instanceof ProviderError)) {
          const failure =
            error instanceof CTestGenError ? error : new CTestGenError(toError(error).message, "GENERATION_FAILED");
          attempt.error = failure;
          this.log.error(`${name}: attempt ${number} failed: ${failure.message}`);
          return finish("exhausted_fail", selectBestAttempt(attempts), failure.message);
        }

        attempt.error = error;
        this.log.warn(`${name}: attempt ${number}/${this.attemptBudget} failed (${error.kind}): ${error.message}`);

        if (number < this.attemptBudget) {
          machine.transition("attempting");
          continue;
        }

        const best = selectBestAttempt(attempts);
        if (best && this.options.regenerateOnLowQuality) {
          return finish("exhausted_warn", best);
        }
        return finish("exhausted_fail", best, error.message);
      }

      attempt.validation = validation;
      attempt.outcome = validation.compiled ? "compiled" : "failed";
      this.log.debug(`${name}: attempt ${number} rated ${validation.tier} with ${validation.issues.length} issue(s)`);

      if (meetsThreshold(validation.tier, this.options.qualityThreshold)) {
        return finish("accepted", attempt);
      }

      if (!this.options.regenerateOnLowQuality) {
        return finish(
          "exhausted_fail",
          attempt,
          `Rated ${validation.tier}, below the ${this.options.qualityThreshold} threshold; regeneration is disabled`
        );
      }

      if (number < this.attemptBudget) {
        feedback = createFeedbackBundle(number, validation);
        machine.transition("attempting");
        continue;
      }

      return finish("exhausted_warn", selectBestAttempt(attempts));
    }

    // Reached only with an empty budget, which attemptBudget rules out
    return finish("exhausted_fail", selectBestAttempt(attempts), "attempt budget exhausted");
  }
}
