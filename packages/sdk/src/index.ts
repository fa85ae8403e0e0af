// public api for @pipewright/sdk
// usage:
//   import { Workflow, ShellCommand } from '@pipewright/sdk';
//   class Ci extends Workflow { async run() { await this.step(new ShellCommand('npm', ['test'])); } }
//   Ci.main();

export { Workflow, defineWorkflow } from './workflow';
export type { WorkflowClass, WorkflowHandler } from './workflow';
export { BaseStep, createStep } from './step';
export type { Step, CleanupFn, CreateStepOptions } from './step';
export { step, workflow, dispatchStep, dispatchWorkflow } from './dispatch';
export type { StepInput, WorkflowInput } from './dispatch';
export { runWorkflow, main, parseWorkspaceOption } from './run';
export type { RunOptions, RunResult } from './run';
export { ExecutionContext, currentContext, withContext } from './context';
export type { ExecutionContextOptions, WorkingDirectory } from './context';
export { CleanupStack } from './cleanup-stack';
export type { CleanupEntry, UnwindResult } from './cleanup-stack';
export { MAX_RETRY_DELAY_SECONDS, retry, sleep } from './retry';
export type { RetryOptions, Sleep } from './retry';
export { backoffSchedule, calculateBackOff } from './utils/backoff';
export type { BackoffOptions } from './utils/backoff';
export { summarize } from './utils/serialization';
export { Logger, consoleSink, isLogLevel, LOG_LEVELS } from './logger';
export type { LogEntry, LogEntryLevel, LogLevel, LogSink, LoggerOptions } from './logger';
export { Environment } from './environment';
export type { EnvironmentVariables } from './environment';
export { Shell, spawnProcess, quoteArgument } from './shell';
export type { ProcessOptions, ProcessResult, ProcessRunner, ShellHost, ShellOptions } from './shell';
export { EnvironmentSecret, FileSecret, loadSecretString, decodeBase64 } from './secret';
export type { Secret, SecretTransform } from './secret';
export { GitHubPlatform, detectPlatform, knownPlatforms } from './platform';
export type { Platform } from './platform';
export { loadConfig } from './config';
export type { EngineConfig } from './config';
export * from './errors';
export * from './steps';
export * from './testing';
