import type { TrendAlert } from '@flakelens/shared';

/**
 * A channel trend alerts are delivered to
 */
export interface Notifier {
  readonly name: string;
  send(alert: TrendAlert): Promise<void>;
}

export interface AlertDispatch {
  readonly alert: TrendAlert | null;
  readonly delivered: readonly string[];
  readonly failed: readonly string[];
}
