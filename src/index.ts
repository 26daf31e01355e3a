export * from './types/uri.js';
export { parseUri, formatUri, PACKAGE_SCHEMES } from './parser/uri.js';
export {
    SCHEME_ENV_VARS,
    GENERIC_ENV_VAR,
    collectSearchRoots,
    envVarsFor,
    pathListDelimiter,
    splitPathList
} from './core/roots.js';
export type { CollectOptions, SchemeEnvVars } from './core/roots.js';
export {
    SCHEME_LAYOUTS,
    candidatesFor,
    findAllMatches,
    resolveRoboticsUri,
    resolveRoboticsUriPath,
    resolveUri,
    searchRootsFor
} from './core/resolver.js';
export type { Layout, ProbeOptions, ResolveOptions } from './core/resolver.js';
export { RoboticsUriError, describeRoot, formatFailure } from './core/errors.js';
export { discoverPackages } from './core/discovery.js';
export type { DiscoveredPackage } from './core/discovery.js';
