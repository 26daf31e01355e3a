import ansis from 'ansis';
import { ResolutionFailure } from '../types/uri.js';
import { DiscoveredPackage } from './discovery.js';
import { describeRoot, formatFailure } from './errors.js';

export type OutputFormat = 'plain' | 'json';
export type ColorMode = 'auto' | 'always' | 'never';

export interface ReporterOptions {
    color: ColorMode;
    format: OutputFormat;
}

export class Reporter {
    private options: ReporterOptions;
    private shouldColor: boolean;

    constructor(options: ReporterOptions) {
        this.options = options;
        this.shouldColor = this.shouldUseColor();
    }

    private shouldUseColor(): boolean {
        if (this.options.color === 'never') return false;
        if (this.options.color === 'always') return true;
        if (this.options.format === 'json') return false;

        // auto mode: diagnostics go to stderr
        const hasNoColor = process.env.NO_COLOR !== undefined;
        const hasForceColor = process.env.FORCE_COLOR !== undefined;
        const isTTY = process.stderr.isTTY === true;

        return !hasNoColor && (hasForceColor || isTTY);
    }

    private colorize(text: string, color: (text: string) => string): string {
        return this.shouldColor ? color(text) : text;
    }

    printPath(resolved: string): void {
        console.log(this.options.format === 'json' ? JSON.stringify({ path: resolved }) : resolved);
    }

    printMatches(paths: string[]): void {
        if (this.options.format === 'json') {
            console.log(JSON.stringify({ paths }));
            return;
        }
        paths.forEach(p => console.log(p));
    }

    printPackages(packages: DiscoveredPackage[]): void {
        if (this.options.format === 'json') {
            console.log(JSON.stringify(packages.map(p => ({
                name: p.name,
                path: p.path,
                layout: p.layout,
                source: describeRoot(p.root),
                shadowed: p.shadowed
            }))));
            return;
        }

        for (const pkg of packages) {
            console.log(`${pkg.name}\t${pkg.path}`);
            for (const hidden of pkg.shadowed) {
                console.error(this.colorize(`  ↳ shadows ${hidden}`, ansis.dim));
            }
        }
    }

    printFailure(failure: ResolutionFailure): void {
        if (this.options.format === 'json') {
            console.error(JSON.stringify({ error: failure }));
            return;
        }

        const [headline, ...details] = formatFailure(failure).split('\n');
        console.error(this.colorize(`Error [${failure.code}]: ${headline}`, ansis.red));
        details.forEach(line => console.error(this.colorize(line, ansis.dim)));
    }

    printWarning(message: string): void {
        if (this.options.format === 'json') {
            console.warn(JSON.stringify({ warning: message }));
            return;
        }

        console.warn(this.colorize(`Warning: ${message}`, ansis.yellow));
    }
}
