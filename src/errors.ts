export type DecisionErrorCode =
  | "schema_violation"
  | "ambiguous_dependency"
  | "dependency_cycle"
  | "duplicate_label"
  | "transform_failed"
  | "keyed_by_unresolved"
  | "index_lookup_failed"
  | "queue_request_failed"
  | "chunking_overflow"
  | "unknown_strategy"
  | "unknown_transform"
  | "kind_config_invalid"
  | "config_missing"
  | "invalid_trigger";

export class DecisionError extends Error {
  readonly code: DecisionErrorCode;
  readonly label?: string;

  constructor(code: DecisionErrorCode, message: string, options: { label?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "DecisionError";
    this.code = code;
    this.label = options.label;
  }
}

export class SchemaViolationError extends DecisionError {
  readonly field: string;

  constructor(label: string, field: string, detail: string) {
    super("schema_violation", `task ${label}: ${field || "/"} ${detail}`, { label });
    this.name = "SchemaViolationError";
    this.field = field;
  }
}

export class AmbiguousDependencyError extends DecisionError {
  readonly dependency: string;

  constructor(label: string, dependency: string) {
    super(
      "ambiguous_dependency",
      `task ${label} depends on ${dependency}, which is neither in the graph nor resolved through the index`,
      { label }
    );
    this.name = "AmbiguousDependencyError";
    this.dependency = dependency;
  }
}

export class DependencyCycleError extends DecisionError {
  readonly labels: string[];

  constructor(labels: string[]) {
    super("dependency_cycle", `dependency cycle among: ${labels.join(", ")}`);
    this.name = "DependencyCycleError";
    this.labels = labels;
  }
}

export class TransformError extends DecisionError {
  readonly transform: string;

  constructor(transform: string, label: string | undefined, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      "transform_failed",
      `transform ${transform} failed${label ? ` on task ${label}` : ""}: ${reason}`,
      { label, cause }
    );
    this.name = "TransformError";
    this.transform = transform;
  }
}

export class IndexLookupError extends DecisionError {
  readonly indexPath: string;
  readonly status?: number;

  constructor(indexPath: string, detail: string, options: { status?: number; cause?: unknown } = {}) {
    super("index_lookup_failed", `index lookup for ${indexPath} failed: ${detail}`, {
      cause: options.cause,
    });
    this.name = "IndexLookupError";
    this.indexPath = indexPath;
    this.status = options.status;
  }
}

export class ChunkingOverflowError extends DecisionError {
  constructor(label: string, size: number, max: number) {
    super("chunking_overflow", `chunk ${label} holds ${size} dependencies, above the limit of ${max}`, {
      label,
    });
    this.name = "ChunkingOverflowError";
  }
}

export class QueueRequestError extends DecisionError {
  readonly status?: number;

  constructor(operation: string, detail: string, options: { status?: number; cause?: unknown } = {}) {
    super("queue_request_failed", `queue ${operation} failed: ${detail}`, { cause: options.cause });
    this.name = "QueueRequestError";
    this.status = options.status;
  }
}
