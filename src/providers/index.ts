/**
 * Built-in providers
 */

export { DirectoryMasqueradeProvider } from './directory-masquerade-provider.js';
export type { DirectoryMasqueradeProviderOptions } from './directory-masquerade-provider.js';

export { InMemoryUserDirectory } from './user-directory.js';
export type { DirectoryUser, UserDirectory } from './user-directory.js';
