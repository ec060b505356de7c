import type {
  CategoricalDimension,
  CrossTabDimension,
  FailureEvent,
  FilterSelection,
  FilterStage,
} from '@flakelens/shared';
import { addDays } from '@flakelens/shared';

interface StageDescriptorBase {
  readonly stage: FilterStage;
  /** Stages whose selections constrain this stage's option set */
  readonly upstream: readonly FilterStage[];
  readonly matches: (event: FailureEvent, selection: FilterSelection) => boolean;
}

export interface CategoricalStageDescriptor extends StageDescriptorBase {
  readonly kind: 'categorical';
  readonly stage: CategoricalDimension;
  readonly accessor: (event: FailureEvent) => string | null;
}

export interface DateRangeStageDescriptor extends StageDescriptorBase {
  readonly kind: 'dateRange';
  readonly stage: 'dateRange';
}

export type StageDescriptor = CategoricalStageDescriptor | DateRangeStageDescriptor;

function categorical(
  stage: CategoricalDimension,
  accessor: (event: FailureEvent) => string | null,
  upstream: readonly FilterStage[]
): CategoricalStageDescriptor {
  return {
    kind: 'categorical',
    stage,
    accessor,
    upstream,
    // Rows lacking the value only pass while the dimension is a wildcard
    matches: (event, selection) => {
      const selected = selection[stage];
      return selected === null || accessor(event) === selected;
    },
  };
}

/**
 * Filter chain in dependency order: platform → team → pipeline → date range
 * → app version.
 */
export const FILTER_STAGES: readonly StageDescriptor[] = [
  categorical('platform', (event) => event.platform, []),
  categorical('team', (event) => event.team, ['platform']),
  categorical('pipeline', (event) => event.pipeline, ['platform', 'team']),
  {
    kind: 'dateRange',
    stage: 'dateRange',
    upstream: ['platform', 'team', 'pipeline'],
    // Inclusive on both ends at day resolution
    matches: (event, selection) => {
      const time = event.occurredAt.getTime();
      return (
        time >= selection.dateRange.start.getTime() &&
        time < addDays(selection.dateRange.end, 1).getTime()
      );
    },
  },
  categorical('appVersion', (event) => event.appVersion, ['platform', 'team', 'pipeline', 'dateRange']),
];

/**
 * The resolver narrows rows in a single pass, which is only correct when every
 * stage's upstream set is exactly the stages before it.
 */
export function assertLinearChain(stages: readonly StageDescriptor[]): void {
  const seen: FilterStage[] = [];
  for (const descriptor of stages) {
    const upstream = [...descriptor.upstream].sort();
    const preceding = [...seen].sort();
    if (upstream.length !== preceding.length || upstream.some((stage, i) => stage !== preceding[i])) {
      throw new Error(
        `Filter stage '${descriptor.stage}' must depend on exactly [${preceding.join(', ')}], got [${upstream.join(', ')}]`
      );
    }
    seen.push(descriptor.stage);
  }
}

assertLinearChain(FILTER_STAGES);

export const CROSS_TAB_ACCESSORS: Readonly<Record<CrossTabDimension, (event: FailureEvent) => string>> = {
  platform: (event) => event.platform,
  team: (event) => event.team,
  pipeline: (event) => event.pipeline,
  failureReason: (event) => event.failureReason,
};
