import type { DiagnosticContext } from '../diagnostics/types.js';
import type { EnvContext } from '../environment/types.js';

export type ShutdownCallback = () => Promise<void> | void;

export interface ShutdownConfiguration {
  /** Upper bound for a single shutdown callback, in milliseconds. */
  callbackTimeout: number;
  /** Upper bound for the whole shutdown sequence before the process is forced out. */
  totalTimeout: number;
}

export interface ProcessLifecycleConfig {
  shutdownConfiguration?: ShutdownConfiguration;
  exit?: (code: number) => void;
}

export interface ProcessStartResult {
  diagnosticContext: DiagnosticContext;
  envContext: EnvContext;
}

export type ProcessStartFn = (context: ProcessLifecycleContext) => Promise<ProcessStartResult>;

export interface ProcessLifecycleContext {
  onShutdown(callback: ShutdownCallback): void;
  shutdown(): Promise<void>;
  isShuttingDown(): boolean;
  restart(): Promise<void>;
}
