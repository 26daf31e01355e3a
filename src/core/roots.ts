import path from 'path';
import { Environment, PackageScheme, Platform, RootProvenance, SearchRoot } from '../types/uri.js';

export interface SchemeEnvVars {
    primary: string;
    aliases: readonly string[];
}

// Origin of each variable:
// ROS_PACKAGE_PATH (ROS 1), AMENT_PREFIX_PATH (ROS 2, install prefixes with a share/ tree),
// GAZEBO_MODEL_PATH (Gazebo Classic), SDF_PATH (sdformat),
// IGN_GAZEBO_RESOURCE_PATH (Ignition Gazebo <= 7), GZ_SIM_RESOURCE_PATH (Gazebo Sim >= 7)
export const SCHEME_ENV_VARS: Record<PackageScheme, SchemeEnvVars> = {
    package: {
        primary: 'ROS_PACKAGE_PATH',
        aliases: ['AMENT_PREFIX_PATH', 'GAZEBO_MODEL_PATH', 'GZ_SIM_RESOURCE_PATH', 'IGN_GAZEBO_RESOURCE_PATH', 'SDF_PATH']
    },
    model: {
        primary: 'GAZEBO_MODEL_PATH',
        aliases: ['GZ_SIM_RESOURCE_PATH', 'IGN_GAZEBO_RESOURCE_PATH', 'SDF_PATH', 'ROS_PACKAGE_PATH', 'AMENT_PREFIX_PATH']
    }
};

export const GENERIC_ENV_VAR = 'ROBOTICS_URI_PATH';

export interface CollectOptions {
    /** Extra variables to read right after the caller directories, in order. */
    extraEnvVars?: readonly string[];
    platform?: Platform;
}

export function pathListDelimiter(platform?: Platform): string {
    return platform ? path[platform].delimiter : path.delimiter;
}

export function splitPathList(value: string | undefined, delimiter: string): string[] {
    if (!value) return [];
    return value.split(delimiter).filter(entry => entry !== '');
}

/** Every variable consulted for a scheme, in precedence order. */
export function envVarsFor(scheme: PackageScheme): string[] {
    const { primary, aliases } = SCHEME_ENV_VARS[scheme];
    return [primary, ...aliases, GENERIC_ENV_VAR];
}

export function collectSearchRoots(
    scheme: PackageScheme,
    callerDirs: readonly string[],
    env: Environment,
    options: CollectOptions = {}
): SearchRoot[] {
    const delimiter = pathListDelimiter(options.platform);
    const roots: SearchRoot[] = [];

    const fromEnv = (name: string, provenance: RootProvenance) => {
        for (const dir of splitPathList(env[name], delimiter)) {
            roots.push({ path: dir, provenance, source: name });
        }
    };

    for (const dir of callerDirs) {
        if (dir !== '') roots.push({ path: dir, provenance: 'caller' });
    }
    for (const name of options.extraEnvVars ?? []) {
        fromEnv(name, 'caller');
    }

    const { primary, aliases } = SCHEME_ENV_VARS[scheme];
    fromEnv(primary, 'env-primary');
    for (const alias of aliases) {
        fromEnv(alias, 'env-alias');
    }
    fromEnv(GENERIC_ENV_VAR, 'env-generic');

    return roots;
}
