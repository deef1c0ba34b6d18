import type Docker from "dockerode";
import type { RegistryAuth } from "../credentials/types.js";

/** A container as seen at discovery time. Never mutated by the orchestrator. */
export interface ContainerDescriptor {
  id: string;
  /** Image reference the container was started from (e.g. `nginx:1.27`). */
  image: string;
  /** Content id of the image backing the container. */
  imageId: string;
  labels: Record<string, string>;
  names: string[];
  state: string;
  networkMode: string | null;
  networks: string[];
}

/** Options that recreate an equivalent container: config, host config and per-network endpoints. */
export type RecreateOptions = Omit<Docker.ContainerCreateOptions, "name">;

/** What `inspect` captures before any destructive step. */
export interface ContainerSnapshot {
  /** Name without the leading `/`; null recreates the container anonymously. */
  name: string | null;
  image: string;
  autoRemove: boolean;
  createOptions: RecreateOptions;
}

/**
 * Operations the orchestrator needs from a container runtime.
 * Implementations must be safe to share between concurrent invocations.
 */
export interface ContainerRuntimeClient {
  /**
   * Running containers that carry the label key, whatever its value.
   * `image` is always a pullable reference, never a bare image id.
   */
  listByLabelKey(labelKey: string): Promise<ContainerDescriptor[]>;
  inspect(id: string): Promise<ContainerSnapshot>;
  /** Pull an image and return the progress log, one event per line. */
  pull(imageRef: string, auth?: RegistryAuth): Promise<string>;
  stop(id: string, graceSeconds: number): Promise<void>;
  remove(id: string): Promise<void>;
  /** Resolve once an auto-removing container is gone, or immediately if it already is. */
  waitForRemoval(id: string): Promise<void>;
  /** Create a container and return its id. A null name lets the runtime pick one. */
  create(options: RecreateOptions, name: string | null): Promise<string>;
  start(id: string): Promise<void>;
  describe(id: string): Promise<ContainerDescriptor>;
  removeImage(imageId: string): Promise<void>;
  /** Reachability check for startup and health. */
  ping(): Promise<void>;
}
