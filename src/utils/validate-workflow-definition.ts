import { DefinitionValidationError } from '../errors/definition-validation.error';
import type {
  Condition,
  StepKind,
  WorkflowActionDefinition,
  WorkflowDefinition,
  WorkflowStep,
  WorkflowTransition,
  WorkflowTrigger,
} from '../interfaces/workflow-definition.interface';
import { TERMINAL_STEP_ID } from '../workflow.constants';
import { COMPARISON_OPERATORS, isAlwaysCondition } from './evaluate-condition';
import { isPlainObject } from './resolve-path';

const STEP_KINDS: readonly StepKind[] = ['AUTO_ACTION', 'HUMAN_TASK'];

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function isStepKind(value: unknown): value is StepKind {
  return STEP_KINDS.some((kind) => kind === value);
}

/** Reads a field stored either camelCase or snake_case. */
function field(
  input: Record<string, unknown>,
  camelKey: string,
  snakeKey: string,
): unknown {
  return input[camelKey] ?? input[snakeKey];
}

/** An absent or path-less condition leaves a trigger or transition unconditional. */
function hasCondition(value: unknown): boolean {
  return value !== undefined && value !== null && !isAlwaysCondition(value);
}

function validateCondition(
  workflowId: string,
  input: unknown,
  where: string,
): Condition {
  if (!isPlainObject(input)) {
    throw new DefinitionValidationError(
      workflowId,
      `${where}: condition must be an object`,
    );
  }

  // Inside a combinator a path-less condition stays, as an empty "all".
  if (isAlwaysCondition(input)) {
    return { all: [] };
  }

  if ('all' in input || 'any' in input) {
    const key = 'all' in input ? 'all' : 'any';
    const children = input[key];
    if (!Array.isArray(children)) {
      throw new DefinitionValidationError(
        workflowId,
        `${where}: "${key}" must be a list of conditions`,
      );
    }
    const validated = children.map((child, i) =>
      validateCondition(workflowId, child, `${where}.${key}[${i}]`),
    );
    return key === 'all' ? { all: validated } : { any: validated };
  }

  const { path, op, value } = input;
  if (!isNonEmptyString(path)) {
    throw new DefinitionValidationError(
      workflowId,
      `${where}: condition path must be a non-empty string`,
    );
  }
  const operator = COMPARISON_OPERATORS.find((candidate) => candidate === op);
  if (!operator) {
    throw new DefinitionValidationError(
      workflowId,
      `${where}: unsupported operator ${JSON.stringify(op)}`,
    );
  }
  return { path, op: operator, value };
}

function validateTrigger(workflowId: string, input: unknown): WorkflowTrigger {
  if (!isPlainObject(input) || !isNonEmptyString(input.type)) {
    throw new DefinitionValidationError(
      workflowId,
      'trigger must be an object with a non-empty type',
    );
  }
  const trigger: WorkflowTrigger = { type: input.type };
  if (hasCondition(input.condition)) {
    trigger.condition = validateCondition(
      workflowId,
      input.condition,
      'trigger',
    );
  }
  return trigger;
}

function validateAction(
  workflowId: string,
  input: unknown,
  where: string,
  actionTypes: ReadonlySet<string>,
): WorkflowActionDefinition {
  if (!isPlainObject(input) || !isNonEmptyString(input.type)) {
    throw new DefinitionValidationError(
      workflowId,
      `${where}: action must be an object with a non-empty type`,
    );
  }
  if (!actionTypes.has(input.type)) {
    throw new DefinitionValidationError(
      workflowId,
      `${where}: unknown action type "${input.type}"`,
    );
  }
  const config = input.config ?? {};
  if (!isPlainObject(config)) {
    throw new DefinitionValidationError(
      workflowId,
      `${where}: action config must be an object`,
    );
  }
  return { type: input.type, config };
}

function validateTransition(
  workflowId: string,
  input: unknown,
  where: string,
): WorkflowTransition {
  const targetStepId = isPlainObject(input)
    ? field(input, 'targetStepId', 'target_step_id')
    : undefined;
  if (!isPlainObject(input) || !isNonEmptyString(targetStepId)) {
    throw new DefinitionValidationError(
      workflowId,
      `${where}: transition must have a non-empty targetStepId`,
    );
  }
  const transition: WorkflowTransition = { targetStepId };
  if (hasCondition(input.condition)) {
    transition.condition = validateCondition(workflowId, input.condition, where);
  }
  return transition;
}

function validateStep(
  workflowId: string,
  key: string,
  input: unknown,
  actionTypes: ReadonlySet<string>,
): WorkflowStep {
  if (!isPlainObject(input)) {
    throw new DefinitionValidationError(
      workflowId,
      `step "${key}" must be an object`,
    );
  }
  if (key === TERMINAL_STEP_ID) {
    throw new DefinitionValidationError(
      workflowId,
      `step id "${TERMINAL_STEP_ID}" is reserved`,
    );
  }
  if (input.id !== undefined && input.id !== key) {
    throw new DefinitionValidationError(
      workflowId,
      `step "${key}" declares a different id "${String(input.id)}"`,
    );
  }
  if (!isStepKind(input.kind)) {
    throw new DefinitionValidationError(
      workflowId,
      `step "${key}" has invalid kind ${JSON.stringify(input.kind)}`,
    );
  }

  const actions = input.actions ?? [];
  const transitions = input.transitions ?? [];
  if (!Array.isArray(actions) || !Array.isArray(transitions)) {
    throw new DefinitionValidationError(
      workflowId,
      `step "${key}" actions and transitions must be lists`,
    );
  }

  return {
    id: key,
    name: isNonEmptyString(input.name) ? input.name : key,
    kind: input.kind,
    actions: actions.map((action, i) =>
      validateAction(
        workflowId,
        action,
        `step "${key}" action ${i}`,
        actionTypes,
      ),
    ),
    transitions: transitions.map((transition, i) =>
      validateTransition(
        workflowId,
        transition,
        `step "${key}" transition ${i}`,
      ),
    ),
  };
}

/**
 * Steps come keyed by id, or as a list whose entries carry their own id.
 */
function stepEntries(workflowId: string, input: unknown): Array<[string, unknown]> {
  if (isPlainObject(input)) {
    return Object.entries(input);
  }
  if (!Array.isArray(input)) {
    return [];
  }

  const entries: Array<[string, unknown]> = [];
  const seen = new Set<string>();
  input.forEach((step, i) => {
    const stepId = isPlainObject(step) ? step.id : undefined;
    if (!isNonEmptyString(stepId)) {
      throw new DefinitionValidationError(
        workflowId,
        `step ${i} must have a non-empty id`,
      );
    }
    if (seen.has(stepId)) {
      throw new DefinitionValidationError(
        workflowId,
        `duplicate step id "${stepId}"`,
      );
    }
    seen.add(stepId);
    entries.push([stepId, step]);
  });
  return entries;
}

/**
 * Checks a definition offered for creation and returns it typed.
 * `initial_step_id` and `target_step_id` are read as well as their
 * camelCase forms.
 * Rejects a dangling initial step or transition target, a reserved or
 * mismatched step id, an unknown action type and malformed conditions.
 */
export function validateWorkflowDefinition(
  input: unknown,
  actionTypes: Iterable<string>,
): WorkflowDefinition {
  if (!isPlainObject(input)) {
    throw new DefinitionValidationError(undefined, 'must be an object');
  }

  const { id } = input;
  if (!isNonEmptyString(id)) {
    throw new DefinitionValidationError(undefined, 'id must be a non-empty string');
  }

  const entries = stepEntries(id, input.steps);
  if (entries.length === 0) {
    throw new DefinitionValidationError(id, 'steps must be a non-empty mapping');
  }

  const knownTypes = new Set(actionTypes);
  const steps: Record<string, WorkflowStep> = {};
  for (const [key, stepInput] of entries) {
    steps[key] = validateStep(id, key, stepInput, knownTypes);
  }

  const initialStepId = field(input, 'initialStepId', 'initial_step_id');
  if (!isNonEmptyString(initialStepId) || !(initialStepId in steps)) {
    throw new DefinitionValidationError(
      id,
      `initial step "${String(initialStepId)}" does not exist`,
    );
  }

  for (const step of Object.values(steps)) {
    for (const transition of step.transitions) {
      if (
        transition.targetStepId !== TERMINAL_STEP_ID &&
        !(transition.targetStepId in steps)
      ) {
        throw new DefinitionValidationError(
          id,
          `step "${step.id}" targets unknown step "${transition.targetStepId}"`,
        );
      }
    }
  }

  return {
    id,
    name: isNonEmptyString(input.name) ? input.name : id,
    trigger: validateTrigger(id, input.trigger),
    initialStepId,
    steps,
    active: input.active !== false,
  };
}
