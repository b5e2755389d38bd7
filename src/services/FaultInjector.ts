import type { RemoteOperation } from '../types/storage.js';
import { S3Error } from '../utils/errorHandler.js';

/**
 * How damaging a failure at this point is. `High` marks calls whose failure
 * can leave remote state half-changed (completing an upload, batched
 * deletes).
 */
export type FaultSensitivity = 'Normal' | 'High';

export type FaultStage = 'before' | 'after';

export interface FaultPoint {
  operation: RemoteOperation;
  stage: FaultStage;
  sensitivity: FaultSensitivity;
  bucket: string;
  key?: string;
  /** Set on `after` points: whether the remote call itself failed */
  failed?: boolean;
}

/**
 * Invoked around every remote call. Throwing fails the call as if the
 * remote store had failed it; returning a promise delays it. `after` points
 * fire whether the call succeeded or failed.
 */
export type FaultInjector = (point: FaultPoint) => void | Promise<void>;

export interface FaultRule {
  operation?: RemoteOperation | RemoteOperation[];
  stage?: FaultStage;
  sensitivity?: FaultSensitivity;
  match?: (point: FaultPoint) => boolean;
  /** Matching points to let through before the rule fires */
  skip?: number;
  /** How many times the rule fires, unlimited when omitted */
  times?: number;
  delayMs?: number;
  /** Error to throw when the rule fires; omit for a delay-only rule */
  error?: (point: FaultPoint) => unknown;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function injectedFault(point: FaultPoint): S3Error {
  return new S3Error(
    `Injected fault ${point.stage} ${point.operation} [${point.bucket}] ${point.key ?? ''}`.trimEnd(),
    'TransientServiceError'
  );
}

interface RuleState {
  rule: FaultRule;
  seen: number;
  fired: number;
}

/**
 * Rule-driven fault injector for tests. The first matching rule that is due
 * fires; every fired point is recorded.
 */
export class FaultPlan {
  private readonly rules: RuleState[];
  private readonly firedPoints: FaultPoint[] = [];

  constructor(rules: FaultRule[]) {
    this.rules = rules.map((rule) => ({ rule, seen: 0, fired: 0 }));
  }

  get triggered(): readonly FaultPoint[] {
    return this.firedPoints;
  }

  readonly hook: FaultInjector = async (point) => {
    for (const state of this.rules) {
      if (!FaultPlan.matches(state.rule, point)) {
        continue;
      }
      state.seen++;
      if (state.seen <= (state.rule.skip ?? 0)) {
        continue;
      }
      if (state.rule.times !== undefined && state.fired >= state.rule.times) {
        continue;
      }

      state.fired++;
      this.firedPoints.push(point);
      if (state.rule.delayMs) {
        await sleep(state.rule.delayMs);
      }
      if (state.rule.error) {
        throw state.rule.error(point);
      }
      return;
    }
  };

  private static matches(rule: FaultRule, point: FaultPoint): boolean {
    if (rule.operation !== undefined) {
      const operations = Array.isArray(rule.operation) ? rule.operation : [rule.operation];
      if (!operations.includes(point.operation)) {
        return false;
      }
    }
    if (rule.stage !== undefined && rule.stage !== point.stage) {
      return false;
    }
    if (rule.sensitivity !== undefined && rule.sensitivity !== point.sensitivity) {
      return false;
    }
    return rule.match ? rule.match(point) : true;
  }
}

export interface RandomFaultOptions {
  probability: number;
  sensitivity?: FaultSensitivity;
  random?: () => number;
}

/**
 * Fails each remote call point with the given probability
 */
export function randomFaults(options: RandomFaultOptions): FaultInjector {
  const random = options.random ?? Math.random;
  return (point) => {
    if (options.sensitivity !== undefined && options.sensitivity !== point.sensitivity) {
      return;
    }
    if (random() < options.probability) {
      throw injectedFault(point);
    }
  };
}
