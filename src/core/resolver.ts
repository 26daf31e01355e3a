import { existsSync } from 'fs';
import path from 'path';
import { parseUri } from '../parser/uri.js';
import {
    Environment,
    LayoutName,
    PackageScheme,
    ParsedUri,
    Platform,
    Probe,
    ResolutionResult,
    SearchRoot
} from '../types/uri.js';
import { CollectOptions, collectSearchRoots } from './roots.js';
import { RoboticsUriError } from './errors.js';

export interface Layout {
    name: Exclude<LayoutName, 'file'>;
    prefix: readonly string[];
}

const DIRECT: Layout = { name: 'direct', prefix: [] };
const SHARE: Layout = { name: 'share', prefix: ['share'] };

export const SCHEME_LAYOUTS: Record<PackageScheme, readonly Layout[]> = {
    package: [DIRECT, SHARE],
    model: [DIRECT, SHARE]
};

export interface ProbeOptions {
    /** Base for relative search roots. Defaults to `process.cwd()`. */
    cwd?: string;
    platform?: Platform;
    exists?: (candidate: string) => boolean;
}

export interface ResolveOptions extends ProbeOptions, Pick<CollectOptions, 'extraEnvVars'> {
    searchPaths?: readonly string[];
    env?: Environment;
}

function pathApi(platform?: Platform): path.PlatformPath {
    return platform ? path[platform] : path;
}

/**
 * Every concrete path a URI maps to, in precedence order: for each root, the direct layout
 * and then the share layout, before the next root.
 */
export function candidatesFor(uri: ParsedUri, roots: readonly SearchRoot[], options: ProbeOptions = {}): Probe[] {
    const api = pathApi(options.platform);
    const cwd = options.cwd ?? process.cwd();

    if (uri.scheme === 'file') {
        return [{ path: api.resolve(cwd, uri.path), layout: 'file' }];
    }

    const probes: Probe[] = [];
    for (const root of roots) {
        for (const layout of SCHEME_LAYOUTS[uri.scheme]) {
            probes.push({
                path: api.resolve(cwd, root.path, ...layout.prefix, uri.packageName, ...uri.subPath),
                layout: layout.name,
                root
            });
        }
    }
    return probes;
}

export function resolveUri(uri: ParsedUri, roots: readonly SearchRoot[], options: ProbeOptions = {}): ResolutionResult {
    const exists = options.exists ?? existsSync;
    const probes = candidatesFor(uri, roots, options);

    for (const probe of probes) {
        if (exists(probe.path)) {
            return { ok: true, path: probe.path };
        }
    }

    return {
        ok: false,
        failure: {
            code: 'NOT_FOUND',
            uri: uri.raw,
            scheme: uri.scheme,
            roots: [...roots],
            probes,
            message: `No file corresponding to URI "${uri.raw}" found`
        }
    };
}

/** All existing candidates, first one being the path `resolveUri` returns. */
export function findAllMatches(uri: ParsedUri, roots: readonly SearchRoot[], options: ProbeOptions = {}): string[] {
    const exists = options.exists ?? existsSync;
    const matches: string[] = [];
    for (const probe of candidatesFor(uri, roots, options)) {
        if (exists(probe.path) && !matches.includes(probe.path)) {
            matches.push(probe.path);
        }
    }
    return matches;
}

export function searchRootsFor(uri: ParsedUri, options: ResolveOptions = {}): SearchRoot[] {
    if (uri.scheme === 'file') return [];
    return collectSearchRoots(uri.scheme, options.searchPaths ?? [], options.env ?? process.env, {
        extraEnvVars: options.extraEnvVars,
        platform: options.platform
    });
}

export function resolveRoboticsUri(uri: string, options: ResolveOptions = {}): ResolutionResult {
    const parsed = parseUri(uri);
    if (!parsed.ok) {
        return parsed;
    }
    return resolveUri(parsed.uri, searchRootsFor(parsed.uri, options), options);
}

export function resolveRoboticsUriPath(uri: string, options: ResolveOptions = {}): string {
    const result = resolveRoboticsUri(uri, options);
    if (!result.ok) {
        throw new RoboticsUriError(result.failure);
    }
    return result.path;
}
