/**
 * Delivery state machine.
 *
 * Enforces the stage order of one delivery request, producing typed errors
 * on invalid transitions.
 */

import { DeliveryStage, VALID_DELIVERY_TRANSITIONS } from '../domain/delivery';
import { CertificateError, TypedError, createTypedError } from '../domain/errors';

/** Result of a stage transition attempt. */
export interface TransitionResult {
  success: boolean;
  newStage?: DeliveryStage;
  error?: TypedError;
}

/** Attempt a stage transition. */
export function transitionDeliveryStage(
  current: DeliveryStage,
  target: DeliveryStage,
): TransitionResult {
  const validTargets = VALID_DELIVERY_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'SYSTEM.INVALID_TRANSITION',
        message: `Invalid delivery stage transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStage: target };
}

/** Check if a stage is terminal. */
export function isTerminalStage(stage: DeliveryStage): boolean {
  return stage === DeliveryStage.Delivered || stage === DeliveryStage.Failed;
}

/**
 * Stage history of one request. `advance` throws on an out-of-order
 * transition; that is a bug in the pipeline, never a client error.
 */
export class DeliveryTrace {
  private stages: DeliveryStage[] = [DeliveryStage.Received];
  private failure?: TypedError;
  private readonly startedAt = Date.now();

  get current(): DeliveryStage {
    return this.stages[this.stages.length - 1];
  }

  get history(): DeliveryStage[] {
    return [...this.stages];
  }

  get failureReason(): TypedError | undefined {
    return this.failure;
  }

  get elapsedMs(): number {
    return Date.now() - this.startedAt;
  }

  advance(target: DeliveryStage): void {
    const result = transitionDeliveryStage(this.current, target);
    if (!result.success || !result.newStage) {
      throw new CertificateError(
        result.error ?? createTypedError({ code: 'SYSTEM.INVALID_TRANSITION', message: 'Invalid transition' }),
      );
    }
    this.stages.push(result.newStage);
  }

  /** Record the failure reason. A no-op once the trace is terminal. */
  fail(reason: TypedError): void {
    if (isTerminalStage(this.current)) return;
    this.failure = reason;
    this.stages.push(DeliveryStage.Failed);
  }
}
