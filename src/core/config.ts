import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { parse } from 'yaml';

export const DEFAULT_CONFIG_FILE = '.robotics-uri.yml';

export interface ResolverConfig {
    searchPaths: string[];
    envVars: string[];
}

export interface LoadedConfig {
    config: ResolverConfig;
    warnings: string[];
}

type ConfigSection = Record<string, unknown>;

function isSection(value: unknown): value is ConfigSection {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toStringList(value: unknown, key: string, warnings: string[]): string[] {
    if (value === undefined || value === null) return [];
    if (typeof value === 'string') return [value];
    if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) return value;
    warnings.push(`"${key}" must be a string or a list of strings`);
    return [];
}

function applyConfig(source: ConfigSection, target: ResolverConfig, baseDir: string, warnings: string[]) {
    target.searchPaths.push(...toStringList(source.searchPaths, 'searchPaths', warnings).map(p => path.resolve(baseDir, p)));
    target.envVars.push(...toStringList(source.envVars, 'envVars', warnings));
}

/**
 * Reads search paths and extra variables from a YAML config file. A missing file yields an
 * empty config, with a warning only when the caller named it. Problems in the file are
 * returned as warnings.
 */
export function loadConfig(configPath: string, profile?: string, explicit = false): LoadedConfig {
    const config: ResolverConfig = { searchPaths: [], envVars: [] };
    const warnings: string[] = [];

    if (!existsSync(configPath)) {
        if (explicit) warnings.push(`Config file not found at ${configPath}`);
        else if (profile) warnings.push(`Profile "${profile}" requested but no config file found at ${configPath}`);
        return { config, warnings };
    }

    let document: unknown;
    try {
        document = parse(readFileSync(configPath, 'utf8'));
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        warnings.push(`Failed to parse config file at ${configPath}: ${reason}`);
        return { config, warnings };
    }

    if (document === null || document === undefined) {
        return { config, warnings };
    }
    if (!isSection(document)) {
        warnings.push(`Config file at ${configPath} must contain a mapping`);
        return { config, warnings };
    }

    const baseDir = path.dirname(path.resolve(configPath));
    applyConfig(document, config, baseDir, warnings);

    if (profile) {
        const profiles = document.profiles;
        const selected = isSection(profiles) ? profiles[profile] : undefined;
        if (isSection(selected)) {
            applyConfig(selected, config, baseDir, warnings);
        } else {
            warnings.push(`Profile "${profile}" not found in ${configPath}`);
        }
    }

    return { config, warnings };
}
