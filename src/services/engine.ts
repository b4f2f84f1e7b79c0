/**
 * Container engine - the Docker daemon operations a redeploy needs
 */

import Docker, { ContainerCreateOptions } from 'dockerode';
import { Logger } from '../logger';
import { ContainerSpec } from '../types';

/**
 * ContainerInfo is the part of an inspect result the redeploy uses
 */
export interface ContainerInfo {
  imageId: string;
}

interface PullEvent {
  status?: string;
  id?: string;
  error?: string;
}

export interface RemoveOptions {
  removeVolumes: boolean;
}

/**
 * ContainerEngine is the narrow view of the daemon used by RedeployService.
 * Names and IDs are interchangeable wherever Docker accepts either.
 */
export interface ContainerEngine {
  inspectContainer(name: string): Promise<ContainerInfo>;
  stopContainer(name: string, graceSeconds: number): Promise<void>;
  removeContainer(name: string, options: RemoveOptions): Promise<void>;
  tagImage(imageId: string, repository: string, tag: string): Promise<void>;
  pullImage(repository: string, tag: string): Promise<void>;
  createContainer(spec: ContainerSpec): Promise<string>;
  startContainer(id: string): Promise<void>;
}

/**
 * Translate a ContainerSpec into Docker's create options.
 * Every mapping is published on all host interfaces over tcp.
 */
export function toCreateOptions(spec: ContainerSpec): ContainerCreateOptions {
  const exposedPorts: Record<string, {}> = {};
  const portBindings: Record<string, Array<{ HostPort: string }>> = {};

  for (const { containerPort, hostPort } of spec.ports) {
    const key = `${containerPort}/tcp`;
    exposedPorts[key] = {};
    portBindings[key] = [...(portBindings[key] ?? []), { HostPort: String(hostPort) }];
  }

  return {
    name: spec.name,
    Image: spec.image,
    Cmd: spec.command,
    AttachStdout: true,
    AttachStderr: true,
    ExposedPorts: exposedPorts,
    HostConfig: {
      PortBindings: portBindings,
    },
  };
}

export class DockerEngine implements ContainerEngine {
  constructor(
    private readonly docker: Docker,
    private readonly log: Logger
  ) {}

  async inspectContainer(name: string): Promise<ContainerInfo> {
    const info = await this.docker.getContainer(name).inspect();
    return { imageId: info.Image };
  }

  async stopContainer(name: string, graceSeconds: number): Promise<void> {
    this.log.debug('Stopping container %s (grace %ds)', name, graceSeconds);
    await this.docker.getContainer(name).stop({ t: graceSeconds });
  }

  async removeContainer(name: string, options: RemoveOptions): Promise<void> {
    this.log.debug('Removing container %s', name);
    await this.docker.getContainer(name).remove({ v: options.removeVolumes });
  }

  async tagImage(imageId: string, repository: string, tag: string): Promise<void> {
    this.log.debug('Tagging %s as %s:%s', imageId, repository, tag);
    await this.docker.getImage(imageId).tag({ repo: repository, tag });
  }

  /**
   * Pull without registry credentials. Resolves once the progress stream
   * has ended; an error event in the stream rejects.
   */
  async pullImage(repository: string, tag: string): Promise<void> {
    const ref = `${repository}:${tag}`;
    this.log.debug('Pulling %s', ref);
    const stream = await this.docker.pull(ref);

    // The daemon reports pull failures (missing tag, auth required) as an
    // error event inside a 200 stream
    let streamError: string | undefined;

    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(
        stream,
        (error: unknown) => {
          if (error) {
            reject(error instanceof Error ? error : new Error(String(error)));
          } else if (streamError) {
            reject(new Error(streamError));
          } else {
            resolve();
          }
        },
        (event: PullEvent) => {
          if (event.error) {
            streamError = event.error;
          } else if (event.status) {
            this.log.trace('%s %s', event.id ?? ref, event.status);
          }
        }
      );
    });
  }

  async createContainer(spec: ContainerSpec): Promise<string> {
    this.log.debug('Creating container %s from %s', spec.name, spec.image);
    const container = await this.docker.createContainer(toCreateOptions(spec));
    return container.id;
  }

  async startContainer(id: string): Promise<void> {
    this.log.debug('Starting container %s', id);
    await this.docker.getContainer(id).start();
  }
}

/**
 * Connect using the standard Docker client environment
 * (DOCKER_HOST, DOCKER_TLS_VERIFY, DOCKER_CERT_PATH) or the default socket
 */
export function createDockerEngine(log: Logger): DockerEngine {
  return new DockerEngine(new Docker(), log);
}
