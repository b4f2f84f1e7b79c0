/**
 * Type definitions for Docker Hub webhooks and redeploy configuration
 */

/**
 * PushData describes the image push that triggered the webhook
 */
export interface PushData {
  pushed_at: number;
  images: string[];
  tag: string;
  pusher: string;
}

/**
 * RepositoryInfo is the repository metadata Docker Hub sends along
 */
export interface RepositoryInfo {
  status: string;
  description: string;
  is_trusted: boolean;
  full_description: string;
  repo_url: string;
  owner: string;
  is_official: boolean;
  is_private: boolean;
  name: string;
  namespace: string;
  star_count: number;
  comment_count: number;
  date_created: number;
  repo_name: string;
}

/**
 * DockerHubWebhook is the JSON body Docker Hub posts on every push.
 * Only callback_url is used; the rest is accepted as sent.
 */
export interface DockerHubWebhook {
  push_data?: Partial<PushData>;
  callback_url: string;
  repository?: Partial<RepositoryInfo>;
}

/**
 * CallbackState values accepted by the Docker Hub callback endpoint
 */
export type CallbackState = 'success' | 'failure' | 'error';

/**
 * CallbackReply is posted back to the webhook's callback_url
 */
export interface CallbackReply {
  state: CallbackState;
  description: string;
  context: string;
  target_url: string;
}

/**
 * RedeployStage tracks how far a request got. 'failed' is terminal.
 */
export type RedeployStage =
  | 'received'
  | 'body-read'
  | 'parsed'
  | 'validated'
  | 'acknowledged'
  | 'stopped'
  | 'removed'
  | 'pulled'
  | 'created'
  | 'started'
  | 'done'
  | 'failed';

/**
 * EngineStep names the container engine call that is running
 */
export type EngineStep = 'stop' | 'remove' | 'pull' | 'create' | 'start';

export interface PortMapping {
  containerPort: number;
  hostPort: number;
}

export interface ContainerTarget {
  name: string;
  repository: string;
  tag: string;
  command: string[];
  ports: PortMapping[];
  stopTimeoutSeconds: number;
}

export interface CallbackSettings {
  description: string;
  context: string;
  targetUrl: string;
  timeoutMs: number;
}

export interface RollbackSettings {
  enabled: boolean;
  tag: string;
}

/**
 * ReceiverConfig is loaded once at startup
 */
export interface ReceiverConfig {
  listen: {
    host: string;
    port: number;
  };
  container: ContainerTarget;
  trustedCallbackPrefix: string;
  callback: CallbackSettings;
  rollback: RollbackSettings;
  bodyLimit: string;
}

/**
 * ContainerSpec is everything needed to create the target container
 */
export interface ContainerSpec {
  name: string;
  image: string;
  command: string[];
  ports: PortMapping[];
}
