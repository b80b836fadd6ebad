export * from './types.js';
export { GitHubClient } from './client.js';
export type { GitHubClientOptions, MutationOptions, CreatedRepository } from './client.js';
