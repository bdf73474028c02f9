import { readBooleanEnv, readNumberEnv } from '../../lib/load-env';

export type ActionMode = 'review' | 'manual' | 'live';

export interface GuardrailSettings {
  killSwitch: boolean;
  actionMode: ActionMode;
  maxActionsPerHour: number;
}

const HOUR_MS = 60 * 60 * 1000;

export function readGuardrailSettings(): GuardrailSettings {
  const rawMode = String(process.env.ACTION_MODE || 'review').trim().toLowerCase();
  const actionMode: ActionMode = rawMode === 'live' || rawMode === 'manual' ? rawMode : 'review';
  return {
    killSwitch: readBooleanEnv('KILL_SWITCH', true),
    actionMode,
    maxActionsPerHour: Math.floor(readNumberEnv('MAX_ACTIONS_PER_HOUR', 30)),
  };
}

/** Executed-action count per clock hour, kept in process. */
export class HourlyActionCounter {
  private readonly buckets = new Map<number, number>();

  constructor(private readonly clock: () => number = Date.now) {}

  private currentBucket(): number {
    return Math.floor(this.clock() / HOUR_MS);
  }

  count(): number {
    return this.buckets.get(this.currentBucket()) ?? 0;
  }

  increment(n = 1): void {
    const bucket = this.currentBucket();
    for (const key of this.buckets.keys()) {
      if (key < bucket - 1) this.buckets.delete(key);
    }
    this.buckets.set(bucket, (this.buckets.get(bucket) ?? 0) + n);
  }
}

/** Whether a live action may run now. */
export function guardrailsOk(
  counter: HourlyActionCounter,
  settings: GuardrailSettings = readGuardrailSettings()
): boolean {
  if (settings.killSwitch) return false;
  if (settings.actionMode !== 'live') return false;
  return counter.count() < settings.maxActionsPerHour;
}
