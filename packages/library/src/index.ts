export { LocalToolLibrary } from './localLibrary';
export { GitHubToolLibrary } from './githubLibrary';
export type { FetchLike, GitHubLibraryOptions } from './githubLibrary';
export { TtlCache } from './indexCache';
export { createLibrary } from './createLibrary';
