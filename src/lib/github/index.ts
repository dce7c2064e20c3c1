export { AppTokenProvider, type InstallationTokenSource } from './app-auth.js';
export { GitHubClient, type GitHubClientOptions, type RegistrationClient } from './client.js';
export { isRetryableApiError } from './retryable.js';
