import type { RunParameters, TaskDescription, TaskRecord } from "../contracts.js";
import { DecisionError, TransformError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { KindConfig } from "../loader.js";
import type { DockerImages } from "../payloads/docker-image.js";

export interface TransformContext {
  readonly kind: string;
  readonly config: KindConfig;
  readonly params: RunParameters;
  /** Records already built for the kinds listed in `kindDependencies`. */
  readonly kindDependencies: ReadonlyMap<string, readonly TaskRecord[]>;
  readonly logger: Logger;
  /** Image-build tasks of the run; absent when Dockerfiles cannot be read. */
  readonly dockerImages?: DockerImages;
}

export type Transform = (
  context: TransformContext,
  tasks: Iterable<TaskDescription>
) => Iterable<TaskDescription>;

export interface NamedTransform {
  name: string;
  transform: Transform;
}

/**
 * Ordered, immutable list of transforms. `add` returns a new sequence, so a
 * shared base sequence can be extended per kind without aliasing.
 */
export class TransformSequence {
  private readonly transforms: readonly NamedTransform[];

  constructor(transforms: readonly NamedTransform[] = []) {
    this.transforms = [...transforms];
  }

  add(name: string, transform: Transform): TransformSequence {
    return new TransformSequence([...this.transforms, { name, transform }]);
  }

  concat(other: TransformSequence): TransformSequence {
    return new TransformSequence([...this.transforms, ...other.transforms]);
  }

  get names(): string[] {
    return this.transforms.map((t) => t.name);
  }

  /** Runs every transform in order and collects the final output. */
  run(context: TransformContext, tasks: Iterable<TaskDescription>): TaskDescription[] {
    let stream: Iterable<TaskDescription> = tasks;
    for (const { name, transform } of this.transforms) {
      stream = guarded(name, transform, context, stream);
    }
    return [...stream];
  }
}

/**
 * Wraps one stage so a failure names the transform and the task it was
 * working on. Failures already wrapped by an earlier stage pass through.
 */
function* guarded(
  name: string,
  transform: Transform,
  context: TransformContext,
  input: Iterable<TaskDescription>
): Generator<TaskDescription> {
  let current: string | undefined;
  const tracked = (function* () {
    for (const task of input) {
      current = task.label;
      yield task;
    }
  })();

  let iterator: Iterator<TaskDescription>;
  try {
    iterator = transform(context, tracked)[Symbol.iterator]();
  } catch (err) {
    throw wrap(name, current, err);
  }

  while (true) {
    let step: IteratorResult<TaskDescription>;
    try {
      step = iterator.next();
    } catch (err) {
      throw wrap(name, current, err);
    }
    if (step.done) return;
    const task = step.value;
    if (typeof task !== "object" || task === null || typeof task.label !== "string") {
      throw new TransformError(name, current, new Error("yielded a value that is not a task"));
    }
    yield task;
  }
}

function wrap(name: string, label: string | undefined, err: unknown): DecisionError {
  if (err instanceof TransformError) return err;
  return new TransformError(name, label, err);
}
