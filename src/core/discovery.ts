import fg from 'fast-glob';
import { statSync } from 'fs';
import path from 'path';
import { PackageScheme, SearchRoot } from '../types/uri.js';
import { Layout, ProbeOptions, SCHEME_LAYOUTS } from './resolver.js';

export interface DiscoveredPackage {
    name: string;
    path: string;
    layout: Layout['name'];
    root: SearchRoot;
    /** Locations of the same name in lower-precedence roots, never returned by resolution. */
    shadowed: string[];
}

export function discoverPackages(
    scheme: PackageScheme,
    roots: readonly SearchRoot[],
    options: Omit<ProbeOptions, 'exists'> = {}
): DiscoveredPackage[] {
    const api = options.platform ? path[options.platform] : path;
    const cwd = options.cwd ?? process.cwd();
    const byName = new Map<string, DiscoveredPackage>();

    for (const root of roots) {
        for (const layout of SCHEME_LAYOUTS[scheme]) {
            const dir = api.resolve(cwd, root.path, ...layout.prefix);
            if (!statSync(dir, { throwIfNoEntry: false })?.isDirectory()) continue;

            const names = fg.sync('*', { cwd: dir, onlyDirectories: true, deep: 1 }).sort();
            for (const name of names) {
                // An install prefix lists its own share/ directory under the direct layout
                if (layout.name === 'direct' && name === 'share') continue;

                const location = api.join(dir, name);
                const existing = byName.get(name);
                if (existing) {
                    existing.shadowed.push(location);
                } else {
                    byName.set(name, { name, path: location, layout: layout.name, root, shadowed: [] });
                }
            }
        }
    }

    return [...byName.values()];
}
