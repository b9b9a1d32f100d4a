/**
 * treeport Server Types
 */

/** Whether every session browses from its own root or all share one */
export type RootScope = 'session' | 'shared';

export interface ServerConfig {
  host: string;
  port: number;
  /** Absolute base root new sessions start from */
  root: string;
  rootScope: RootScope;
  /** Keep navigation and listings inside `root` */
  confine: boolean;
  /** Port for the HTTP health endpoint; disabled when absent */
  healthPort?: number;
}

export interface ChangeRootResult {
  ok: boolean;
  message: string;
}

export interface SessionStats {
  sessionId: string;
  peer: string;
  connectedAt: number;
  commandCount: number;
  currentRoot: string;
}

export interface ListeningAddress {
  port: number;
  healthPort?: number;
}
