/**
 * Error taxonomy for workflow compilation and execution.
 *
 * Compile-time errors (SpecValidationError, SchemaBuildError, GraphStructureError)
 * are surfaced before any run starts and are never retried. Node-scoped errors
 * drive the owning node's retry or failure path.
 */

export type ExecutionPhase = 'resolve' | 'invoke' | 'validate';

export class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    options?: { cause?: unknown },
  ) {
    super(suggestion ? `${message}\n\nSuggestion: ${suggestion}` : message, options);
    this.name = 'WorkflowError';
  }
}

export class SpecLoadError extends WorkflowError {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, undefined, options);
    this.name = 'SpecLoadError';
  }
}

export class SpecValidationError extends WorkflowError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'SpecValidationError';
  }
}

export class SchemaBuildError extends WorkflowError {
  constructor(
    message: string,
    public readonly field?: string,
    suggestion?: string,
  ) {
    super(message, suggestion);
    this.name = 'SchemaBuildError';
  }
}

export class GraphStructureError extends WorkflowError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'GraphStructureError';
  }
}

export class TemplateResolutionError extends WorkflowError {
  constructor(
    public readonly path: string,
    public readonly availablePaths: string[],
    public readonly closestMatch?: string,
  ) {
    super(
      `Variable '${path}' not found in inputs or state`,
      closestMatch
        ? `Did you mean '${closestMatch}'? Available: ${availablePaths.join(', ') || '(none)'}`
        : `Available: ${availablePaths.join(', ') || '(none)'}`,
    );
    this.name = 'TemplateResolutionError';
  }
}

export class PredicateError extends WorkflowError {
  constructor(
    message: string,
    public readonly expression: string,
    suggestion?: string,
  ) {
    super(`${message} in expression '${expression}'`, suggestion);
    this.name = 'PredicateError';
  }
}

export class OutputValidationError extends WorkflowError {
  constructor(
    public readonly nodeId: string,
    public readonly field: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(`Node '${nodeId}': output field '${field}' expected ${expected}, got ${actual}`);
    this.name = 'OutputValidationError';
  }
}

export class CapabilityError extends WorkflowError {
  constructor(
    message: string,
    public readonly transient: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, undefined, options);
    this.name = 'CapabilityError';
  }
}

export class ToolNotFoundError extends WorkflowError {
  constructor(
    public readonly toolName: string,
    available: string[],
    closestMatch?: string,
  ) {
    super(
      `Tool '${toolName}' not found in registry`,
      closestMatch ? `Did you mean '${closestMatch}'? Available: ${available.join(', ')}` : undefined,
    );
    this.name = 'ToolNotFoundError';
  }
}

export class SafetyError extends WorkflowError {
  constructor(
    message: string,
    public readonly codeSnippet?: string,
  ) {
    super(message);
    this.name = 'SafetyError';
  }
}

export class NodeExecutionError extends WorkflowError {
  constructor(
    public readonly nodeId: string,
    public readonly phase: ExecutionPhase,
    cause: unknown,
    public readonly attempts: number = 1,
  ) {
    super(`Node '${nodeId}' failed during ${phase}: ${describeError(cause)}`, undefined, { cause });
    this.name = 'NodeExecutionError';
  }
}

export class RunCancelledError extends WorkflowError {
  constructor(public readonly runId: string) {
    super(`Run ${runId} was cancelled`);
    this.name = 'RunCancelledError';
  }
}

export interface FailedGate {
  metric: string;
  message: string;
}

export class QualityGateError extends WorkflowError {
  constructor(public readonly failedGates: FailedGate[]) {
    super(
      `Quality gates failed:\n${failedGates.map((gate) => `  - ${gate.metric}: ${gate.message}`).join('\n')}`,
    );
    this.name = 'QualityGateError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
