import Docker from "dockerode";
import type { RegistryAuth } from "../credentials/types.js";
import type { ContainerDescriptor, ContainerRuntimeClient, ContainerSnapshot, RecreateOptions } from "./types.js";

/** Registry address Docker uses for images without an explicit host. */
export const DOCKER_HUB_ADDRESS = "https://index.docker.io/v1/";

type EndpointsConfig = NonNullable<NonNullable<RecreateOptions["NetworkingConfig"]>["EndpointsConfig"]>;

interface PullErrorEvent {
  error: string;
}

function isPullErrorEvent(event: unknown): event is PullErrorEvent {
  return (
    typeof event === "object" &&
    event !== null &&
    typeof (event as Record<string, unknown>).error === "string"
  );
}

/** Docker 304: stopping a container that is not running. */
function isAlreadyStopped(err: unknown): boolean {
  const msg = err instanceof Error ? err.message : String(err);
  return msg.includes("container already stopped");
}

/** Docker 404: the container no longer exists. */
function isNoSuchContainer(err: unknown): boolean {
  return typeof err === "object" && err !== null && "statusCode" in err && err.statusCode === 404;
}

/** Docker lists the image id instead of the reference once the tag has moved to a newer image. */
function isImageId(image: string, imageId: string): boolean {
  return image === imageId || image.startsWith("sha256:");
}

/**
 * Registry host an image reference points at, for the pull auth config.
 * The first path segment is a host when it has a dot or a port, or is `localhost`.
 */
export function registryAddress(imageRef: string): string {
  const slash = imageRef.indexOf("/");
  if (slash === -1) return DOCKER_HUB_ADDRESS;
  const first = imageRef.slice(0, slash);
  if (first.includes(".") || first.includes(":") || first === "localhost") return first;
  return DOCKER_HUB_ADDRESS;
}

function describeListed(info: Docker.ContainerInfo): ContainerDescriptor {
  return {
    id: info.Id,
    image: info.Image,
    imageId: info.ImageID,
    labels: info.Labels ?? {},
    names: info.Names ?? [],
    state: info.State,
    networkMode: info.HostConfig?.NetworkMode ?? null,
    networks: Object.keys(info.NetworkSettings?.Networks ?? {}),
  };
}

function describeInspected(info: Docker.ContainerInspectInfo): ContainerDescriptor {
  return {
    id: info.Id,
    image: info.Config.Image,
    imageId: info.Image,
    labels: info.Config.Labels ?? {},
    names: info.Name ? [info.Name] : [],
    state: info.State.Status,
    networkMode: info.HostConfig.NetworkMode ?? null,
    networks: Object.keys(info.NetworkSettings.Networks ?? {}),
  };
}

/**
 * Build create options that reproduce an inspected container.
 * The hostname and network alias Docker derives from the old container id are dropped
 * so the replacement gets its own.
 */
export function toRecreateOptions(info: Docker.ContainerInspectInfo): RecreateOptions {
  const shortId = info.Id.slice(0, 12);
  const { Hostname, ...containerConfig } = info.Config;

  const endpoints: EndpointsConfig = {};
  for (const [network, settings] of Object.entries(info.NetworkSettings.Networks ?? {})) {
    const aliases: string[] | undefined = Array.isArray(settings.Aliases)
      ? settings.Aliases.filter((alias: string) => alias !== shortId)
      : undefined;
    endpoints[network] = {
      IPAMConfig: settings.IPAMConfig,
      Links: settings.Links,
      Aliases: aliases,
    };
  }

  return {
    ...containerConfig,
    ...(Hostname && Hostname !== shortId ? { Hostname } : {}),
    HostConfig: info.HostConfig,
    NetworkingConfig: { EndpointsConfig: endpoints },
  };
}

/**
 * ContainerRuntimeClient backed by the Docker Engine API through dockerode.
 */
export class DockerRuntimeClient implements ContainerRuntimeClient {
  readonly docker: Docker;

  constructor(docker?: Docker) {
    this.docker = docker ?? new Docker();
  }

  async listByLabelKey(labelKey: string): Promise<ContainerDescriptor[]> {
    const containers = await this.docker.listContainers({ filters: { label: [labelKey] } });
    const descriptors: ContainerDescriptor[] = [];
    for (const info of containers) {
      const descriptor = describeListed(info);
      if (isImageId(descriptor.image, descriptor.imageId)) {
        try {
          const inspected = await this.docker.getContainer(info.Id).inspect();
          descriptor.image = inspected.Config.Image;
        } catch (err) {
          // Gone since listing.
          if (isNoSuchContainer(err)) continue;
          throw err;
        }
      }
      descriptors.push(descriptor);
    }
    return descriptors;
  }

  async inspect(id: string): Promise<ContainerSnapshot> {
    const info = await this.docker.getContainer(id).inspect();
    return {
      name: info.Name ? info.Name.replace(/^\//, "") || null : null,
      image: info.Config.Image,
      autoRemove: info.HostConfig.AutoRemove === true,
      createOptions: toRecreateOptions(info),
    };
  }

  async pull(imageRef: string, auth?: RegistryAuth): Promise<string> {
    const options = auth
      ? {
          authconfig: {
            username: auth.username,
            password: auth.password,
            serveraddress: registryAddress(imageRef),
          },
        }
      : {};

    const stream = await this.docker.pull(imageRef, options);
    const events = await new Promise<unknown[]>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null, output: unknown[]) => {
        if (err) reject(err);
        else resolve(output ?? []);
      });
    });

    const failure = events.find(isPullErrorEvent);
    if (failure) throw new Error(`Pull of ${imageRef} failed: ${failure.error}`);

    return events.map((event) => JSON.stringify(event)).join("\n");
  }

  async stop(id: string, graceSeconds: number): Promise<void> {
    try {
      await this.docker.getContainer(id).stop({ t: graceSeconds });
    } catch (err) {
      if (!isAlreadyStopped(err)) throw err;
    }
  }

  async remove(id: string): Promise<void> {
    await this.docker.getContainer(id).remove();
  }

  async waitForRemoval(id: string): Promise<void> {
    try {
      await this.docker.getContainer(id).wait({ condition: "removed" });
    } catch (err) {
      if (!isNoSuchContainer(err)) throw err;
    }
  }

  async create(options: RecreateOptions, name: string | null): Promise<string> {
    const container = await this.docker.createContainer(name ? { ...options, name } : options);
    return container.id;
  }

  async start(id: string): Promise<void> {
    await this.docker.getContainer(id).start();
  }

  async describe(id: string): Promise<ContainerDescriptor> {
    const info = await this.docker.getContainer(id).inspect();
    return describeInspected(info);
  }

  async removeImage(imageId: string): Promise<void> {
    await this.docker.getImage(imageId).remove();
  }

  async ping(): Promise<void> {
    await this.docker.ping();
  }
}
