/**
 * Credential management
 * @module services/auth
 */
export { CredentialManager } from './CredentialManager';
export type { CredentialManagerDependencies } from './CredentialManager';
export type { ICredentialSource, AcquiredToken } from './ICredentialSource';
export { StaticTokenCredentialSource } from './StaticTokenCredentialSource';
export { CliCredentialSource, defaultCommandRunner } from './CliCredentialSource';
export type { CliCredentialSourceOptions, CommandRunner, CommandOutput } from './CliCredentialSource';
export { HttpLoginCredentialSource } from './HttpLoginCredentialSource';
export type { HttpLoginCredentialSourceOptions } from './HttpLoginCredentialSource';
export { ChainedCredentialSource } from './ChainedCredentialSource';
