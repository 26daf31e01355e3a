import { Argument, Command, Option } from 'commander';
import path from 'path';
import { DEFAULT_CONFIG_FILE, loadConfig } from './core/config.js';
import { discoverPackages } from './core/discovery.js';
import { ColorMode, OutputFormat, Reporter } from './core/reporter.js';
import { findAllMatches, ResolveOptions, resolveUri, searchRootsFor } from './core/resolver.js';
import { collectSearchRoots, pathListDelimiter, splitPathList } from './core/roots.js';
import { PACKAGE_SCHEMES, parseUri } from './parser/uri.js';
import { Environment, PackageScheme } from './types/uri.js';

export interface ProgramContext {
    version: string;
    env: Environment;
    cwd: string;
}

interface SharedOptions {
    searchPath: string[];
    envVar: string[];
    config?: string;
    profile?: string;
    format: OutputFormat;
    color: ColorMode;
}

interface ResolveCommandOptions extends SharedOptions {
    all: boolean;
}

const collect = (value: string, memo: string[]) => {
    memo.push(value);
    return memo;
};

function addSharedOptions(command: Command): Command {
    return command
        .option('-s, --search-path <paths>', `Additional search directories, separated by "${pathListDelimiter()}" (can be used multiple times)`, collect, [])
        .option('-e, --env-var <name>', 'Read additional search directories from this environment variable (can be used multiple times)', collect, [])
        .option('--config <path>', `Path to a config file (defaults to ${DEFAULT_CONFIG_FILE} in the working directory)`)
        .option('--profile <name>', 'Use a specific profile from the config file')
        .addOption(new Option('--format <format>', 'Output format').choices(['plain', 'json']).default('plain'))
        .addOption(new Option('--color <mode>', 'Color output').choices(['auto', 'always', 'never']).default('auto'));
}

export function createProgram(context: ProgramContext): Command {
    const { env, cwd } = context;

    function prepare(options: SharedOptions): { reporter: Reporter; resolveOptions: ResolveOptions } {
        const reporter = new Reporter({ color: options.color, format: options.format });

        const configPath = options.config ? path.resolve(cwd, options.config) : path.join(cwd, DEFAULT_CONFIG_FILE);
        const { config, warnings } = loadConfig(configPath, options.profile, options.config !== undefined);
        warnings.forEach(w => reporter.printWarning(w));

        const delimiter = pathListDelimiter();
        const resolveOptions: ResolveOptions = {
            searchPaths: [...options.searchPath.flatMap(list => splitPathList(list, delimiter)), ...config.searchPaths],
            extraEnvVars: [...options.envVar, ...config.envVars],
            env,
            cwd
        };
        return { reporter, resolveOptions };
    }

    const program = new Command();

    program
        .name('resolve-robotics-uri')
        .description('Resolve a robotics URI (package://, model://, file://) to an absolute path')
        .version(context.version);

    addSharedOptions(
        program
            .command('resolve', { isDefault: true })
            .description('Print the absolute path a URI resolves to')
            .argument('<uri>', 'URI to resolve')
            .option('--all', 'Print every matching path in precedence order', false)
    ).action((uri: string, options: ResolveCommandOptions) => {
        const { reporter, resolveOptions } = prepare(options);

        const parsed = parseUri(uri);
        if (!parsed.ok) {
            reporter.printFailure(parsed.failure);
            process.exitCode = 1;
            return;
        }

        const roots = searchRootsFor(parsed.uri, resolveOptions);
        const result = resolveUri(parsed.uri, roots, resolveOptions);
        if (!result.ok) {
            reporter.printFailure(result.failure);
            process.exitCode = 1;
            return;
        }

        const matches = findAllMatches(parsed.uri, roots, resolveOptions);
        if (options.all) {
            reporter.printMatches(matches);
            return;
        }
        if (matches.length > 1) {
            reporter.printWarning(`Multiple files (${matches.join(' ')}) found for URI "${uri}", returning the first one`);
        }
        reporter.printPath(result.path);
    });

    addSharedOptions(
        program
            .command('list')
            .description('List the packages or models every search directory provides')
            .addArgument(new Argument('[scheme]', 'URI scheme whose search directories to scan').choices([...PACKAGE_SCHEMES]).default('package'))
    ).action((scheme: PackageScheme, options: SharedOptions) => {
        const { reporter, resolveOptions } = prepare(options);
        const roots = collectSearchRoots(scheme, resolveOptions.searchPaths ?? [], env, {
            extraEnvVars: resolveOptions.extraEnvVars
        });
        reporter.printPackages(discoverPackages(scheme, roots, { cwd }));
    });

    return program;
}
