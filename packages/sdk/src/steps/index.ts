export { ShellCommand } from './shell-command';
export type { ShellCommandOptions } from './shell-command';
export { SetEnvironmentVariable } from './set-environment-variable';
export { WriteSecretFile } from './write-secret-file';
export type { SecretFile, WriteSecretFileOptions } from './write-secret-file';
export { GitCommit } from './git-commit';
export type { GitCommitOptions, GitCommitOutput } from './git-commit';
