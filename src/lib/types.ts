export interface HostState {
  containerExists: boolean;
  containerRunning: boolean;
  imageExists: boolean;
  proxySiteLinked: boolean;
  proxySiteFileExists: boolean;
  defaultSiteLinked: boolean;
}

export interface DeploymentTarget {
  readonly containerName: string;
  readonly imageName: string;
  readonly hostPort: number;
  readonly containerPort: number;
  readonly proxySiteName: string;
  readonly proxyServerName: string;
}

export interface SshConnection {
  user: string;
  host: string;
  keyPath: string;
}

export type Action =
  | { kind: "stop-container"; name: string }
  | { kind: "remove-container"; name: string }
  | { kind: "remove-image"; name: string }
  | { kind: "verify-build-descriptor"; path: string }
  | { kind: "build-image"; path: string; tag: string }
  | { kind: "run-container"; tag: string; name: string; hostPort: number; containerPort: number }
  | { kind: "write-proxy-config"; site: string; content: string }
  | { kind: "link-proxy-site"; site: string }
  | { kind: "unlink-proxy-site"; site: string }
  | { kind: "remove-proxy-config-file"; path: string }
  | { kind: "validate-proxy-config" }
  | { kind: "reload-proxy" };

export type ActionKind = Action["kind"];

export type FailureKind = "remote_build" | "remote_run" | "proxy";

export interface DeploymentResult {
  succeeded: boolean;
  failedAction?: Action;
  failureKind?: FailureKind;
  message: string;
  executed: Action[];
}

export interface ContainerSummary {
  name: string;
  running: boolean;
}

export interface ImageSummary {
  id: string;
  repository: string;
  tag: string;
}

/** Outcome of a single remote step; `ok` is false on a non-zero exit. */
export interface StepOutcome {
  ok: boolean;
  detail?: string;
}
