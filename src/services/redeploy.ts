/**
 * Redeploy service
 *
 * Replaces the target container with one running the freshly pulled image:
 * stop -> remove -> pull -> create -> start. Each step runs only when the
 * one before it succeeded. Runs for the same container name are queued.
 *
 * Before anything is stopped the current image is tagged <repo>:<rollback tag>,
 * so a failed pull, create or start can bring the old version back up.
 */

import { EngineStepError, errorMessage } from '../errors';
import { Logger } from '../logger';
import { ContainerSpec, ContainerTarget, EngineStep, RedeployStage, RollbackSettings } from '../types';
import { ContainerEngine } from './engine';
import { KeyedLock } from './lock';

export interface RedeployOptions {
  container: ContainerTarget;
  rollback: RollbackSettings;
}

export interface RedeployResult {
  containerId: string;
  image: string;
  // Retained image reference, when one was tagged
  previousImage?: string;
}

export class RedeployService {
  constructor(
    private readonly engine: ContainerEngine,
    private readonly options: RedeployOptions,
    private readonly log: Logger,
    private readonly lock: KeyedLock = new KeyedLock()
  ) {}

  /**
   * Redeploy the configured container. Rejects with EngineStepError naming
   * the step that failed.
   */
  redeploy(): Promise<RedeployResult> {
    const { name } = this.options.container;
    if (this.lock.isLocked(name)) {
      this.log.info('Redeploy of %s already in progress, queued', name);
    }
    return this.lock.run(name, () => this.run());
  }

  private spec(image: string): ContainerSpec {
    const { name, command, ports } = this.options.container;
    return { name, image, command, ports };
  }

  private async run(): Promise<RedeployResult> {
    const { engine } = this;
    const { name, repository, tag, stopTimeoutSeconds } = this.options.container;
    const image = `${repository}:${tag}`;
    let stage: RedeployStage = 'acknowledged';

    const step = async <T>(engineStep: EngineStep, next: RedeployStage, action: () => Promise<T>): Promise<T> => {
      try {
        const result = await action();
        stage = next;
        return result;
      } catch (error) {
        throw new EngineStepError(engineStep, stage, error);
      }
    };

    const previousImage = await this.retainPreviousImage();

    await step('stop', 'stopped', () => engine.stopContainer(name, stopTimeoutSeconds));
    await step('remove', 'removed', () => engine.removeContainer(name, { removeVolumes: true }));

    // From here on the old container is gone
    let createdId: string | undefined;
    try {
      await step('pull', 'pulled', () => engine.pullImage(repository, tag));
      const id = await step('create', 'created', () => engine.createContainer(this.spec(image)));
      createdId = id;
      await step('start', 'started', () => engine.startContainer(id));

      this.log.info('Container %s restarted successfully from %s', name, image);
      return { containerId: id, image, previousImage };
    } catch (error) {
      if (previousImage) {
        await this.restore(previousImage, createdId);
      }
      throw error;
    }
  }

  /**
   * Tag the running container's image so the pull of the new tag cannot
   * leave it unreferenced. Returns the retained reference, or undefined
   * when rollback is off or the container could not be inspected.
   */
  private async retainPreviousImage(): Promise<string | undefined> {
    const { container, rollback } = this.options;
    if (!rollback.enabled) {
      return undefined;
    }

    try {
      const info = await this.engine.inspectContainer(container.name);
      await this.engine.tagImage(info.imageId, container.repository, rollback.tag);
      const retained = `${container.repository}:${rollback.tag}`;
      this.log.debug('Retained %s as %s', info.imageId, retained);
      return retained;
    } catch (error) {
      this.log.warn({ err: error }, 'Could not retain previous image of %s, no fallback available', container.name);
      return undefined;
    }
  }

  /**
   * Bring the retained image back up under the container name.
   * Failures are logged; the redeploy has already failed either way.
   */
  private async restore(previousImage: string, createdId: string | undefined): Promise<void> {
    const { name } = this.options.container;
    this.log.warn('Redeploy of %s failed, restarting previous image %s', name, previousImage);

    try {
      if (createdId) {
        await this.engine.removeContainer(createdId, { removeVolumes: true });
      }
      const id = await this.engine.createContainer(this.spec(previousImage));
      await this.engine.startContainer(id);
      this.log.warn('Container %s restored from %s', name, previousImage);
    } catch (error) {
      this.log.error('Fallback restart of %s failed: %s', name, errorMessage(error));
    }
  }
}
