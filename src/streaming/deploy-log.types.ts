export type DeployLogLevel = 'info' | 'warn' | 'error';

/** Leveled text sink the deployer writes its progress to. */
export interface DeployLogSink {
  log(level: DeployLogLevel, message: string): void;
  /** Resolves once every line logged so far has been written. */
  flush(): Promise<void>;
}

export interface DeployLogEvent {
  destination: string;
  level: DeployLogLevel;
  message: string;
  timestamp: string;
}
