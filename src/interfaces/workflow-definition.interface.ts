export type ComparisonOperator =
  | '=='
  | '!='
  | 'in'
  | '>'
  | '>='
  | '<'
  | '<='
  | 'contains';

export interface ComparisonCondition {
  /** Dot-separated path into the evaluation context, e.g. `data.email`. */
  path: string;
  op: ComparisonOperator;
  value?: unknown;
}

export interface AllCondition {
  all: Condition[];
}

export interface AnyCondition {
  any: Condition[];
}

export type Condition = ComparisonCondition | AllCondition | AnyCondition;

export type StepKind = 'AUTO_ACTION' | 'HUMAN_TASK';

export interface WorkflowActionDefinition {
  type: string;
  config: Record<string, unknown>;
}

export interface WorkflowTransition {
  /** Omitted means the transition is always taken. */
  condition?: Condition;
  targetStepId: string;
}

export interface WorkflowStep {
  id: string;
  name: string;
  kind: StepKind;
  actions: WorkflowActionDefinition[];
  transitions: WorkflowTransition[];
}

export interface WorkflowTrigger {
  /** Compared against the event's template id. */
  type: string;
  condition?: Condition;
}

export interface WorkflowDefinition {
  id: string;
  name: string;
  trigger: WorkflowTrigger;
  initialStepId: string;
  steps: Record<string, WorkflowStep>;
  active: boolean;
}
