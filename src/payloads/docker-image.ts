import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";
import type { TaskDescription } from "../contracts.js";
import { DecisionError } from "../errors.js";
import type { JsonValue } from "../json.js";

const INCLUDE_MARKER = "% include";
const DOCKERFILE_SUFFIX = ".dockerfile";
const IMAGE_FILE = "/image.tar.lz4";

/** Attribute naming the image an image-build task produces. */
export const DOCKER_IMAGE_ATTRIBUTE = "docker-image";

export interface DockerImageOptions {
  /** Dockerfile paths are relative to `<kindsDir>/<kind>/`. */
  kindsDir: string;
  /** Expiry of the image artifact and of its index entry. */
  expiresIn: string;
  builderImage: string;
  workerType?: string;
}

/**
 * Reads a Dockerfile, replacing a leading `% include <path>` line with the
 * expanded contents of that file. Included paths are relative to the
 * including file.
 */
export function expandDockerfile(path: string, including: readonly string[] = []): string {
  const absolute = resolve(path);
  if (including.includes(absolute)) {
    throw new DecisionError("kind_config_invalid", `Dockerfile ${path} includes itself`);
  }
  let contents: string;
  try {
    contents = readFileSync(absolute, "utf8");
  } catch (err) {
    throw new DecisionError("config_missing", `Dockerfile ${path} cannot be read`, { cause: err });
  }
  if (!contents.startsWith(INCLUDE_MARKER)) return contents;

  const newline = contents.indexOf("\n");
  const includeLine = newline === -1 ? contents : contents.slice(0, newline);
  const rest = newline === -1 ? "" : contents.slice(newline + 1);
  const included = join(dirname(absolute), includeLine.slice(INCLUDE_MARKER.length).trim());
  return `${expandDockerfile(included, [...including, absolute])}\n${rest}`;
}

export function dockerfileDigest(contents: string): string {
  return createHash("sha256").update(contents, "utf8").digest("hex");
}

export interface DockerImage {
  label: string;
  /** The image-build task, the first time its label is asked for. */
  task?: TaskDescription;
}

/**
 * Image-build tasks of one run. Each Dockerfile becomes one task labelled
 * `docker-image-<name>`, cached at `docker-image.<sha256 of the expanded file>`.
 */
export class DockerImages {
  private readonly options: DockerImageOptions;
  private readonly digests = new Map<string, string>();

  constructor(options: DockerImageOptions) {
    this.options = options;
  }

  imageFor(kind: string, dockerfile: string, label: string, workerType: JsonValue | undefined): DockerImage {
    const file = basename(dockerfile);
    if (!file.endsWith(DOCKERFILE_SUFFIX) || file === DOCKERFILE_SUFFIX) {
      throw new DecisionError(
        "schema_violation",
        `task ${label}: Dockerfile ${dockerfile} must be named <image>${DOCKERFILE_SUFFIX}`,
        { label }
      );
    }
    const name = file.slice(0, -DOCKERFILE_SUFFIX.length);
    const imageLabel = `docker-image-${name}`;
    const contents = expandDockerfile(join(this.options.kindsDir, kind, dockerfile));
    const digest = dockerfileDigest(contents);

    const seen = this.digests.get(imageLabel);
    if (seen === digest) return { label: imageLabel };
    if (seen !== undefined) {
      throw new DecisionError("duplicate_label", `image ${name} is built from two different Dockerfiles`, {
        label: imageLabel,
      });
    }
    this.digests.set(imageLabel, digest);

    const task: TaskDescription = {
      label: imageLabel,
      kind,
      name: imageLabel,
      description: `Docker image: ${name}`,
      attributes: { [DOCKER_IMAGE_ATTRIBUTE]: name },
      cache: { indexPath: `docker-image.${digest}`, expiresIn: this.options.expiresIn },
      worker: {
        implementation: "docker-worker",
        dockerImage: this.options.builderImage,
        maxRunTimeMinutes: 30,
        features: ["dind"],
        env: { DOCKERFILE: contents },
        artifacts: [IMAGE_FILE],
        artifactsExpireIn: this.options.expiresIn,
        scripts: [
          `
            echo "$DOCKERFILE" | docker build -t taskcluster-built -
            docker save taskcluster-built | lz4 > ${IMAGE_FILE}
          `,
        ],
      },
    };
    const buildWorkerType = this.options.workerType ?? workerType;
    if (buildWorkerType !== undefined) task.workerType = buildWorkerType;
    return { label: imageLabel, task };
  }
}
