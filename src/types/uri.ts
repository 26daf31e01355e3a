export type PackageScheme = 'package' | 'model';

export type Scheme = PackageScheme | 'file';

export type Platform = 'posix' | 'win32';

export type Environment = Readonly<Record<string, string | undefined>>;

export interface RoboticsUri {
    readonly scheme: PackageScheme;
    readonly packageName: string;
    readonly subPath: readonly string[];
    readonly raw: string;
}

export interface FileUri {
    readonly scheme: 'file';
    readonly path: string;
    readonly raw: string;
}

export type ParsedUri = RoboticsUri | FileUri;

export type RootProvenance = 'caller' | 'env-primary' | 'env-alias' | 'env-generic';

export interface SearchRoot {
    path: string;
    provenance: RootProvenance;
    source?: string; // Environment variable the directory came from
}

export type LayoutName = 'direct' | 'share' | 'file';

export interface Probe {
    path: string;
    layout: LayoutName;
    root?: SearchRoot;
}

export type FailureCode = 'UNSUPPORTED_SCHEME' | 'MISSING_PACKAGE_NAME' | 'NOT_FOUND';

export interface UnsupportedSchemeFailure {
    code: 'UNSUPPORTED_SCHEME';
    uri: string;
    scheme?: string;
    message: string;
}

export interface MissingPackageNameFailure {
    code: 'MISSING_PACKAGE_NAME';
    uri: string;
    message: string;
}

export interface NotFoundFailure {
    code: 'NOT_FOUND';
    uri: string;
    scheme: Scheme;
    roots: SearchRoot[];
    probes: Probe[];
    message: string;
}

export type ParseFailure = UnsupportedSchemeFailure | MissingPackageNameFailure;

export type ResolutionFailure = ParseFailure | NotFoundFailure;

export type ParseResult =
    | { ok: true; uri: ParsedUri }
    | { ok: false; failure: ParseFailure };

export type ResolutionResult =
    | { ok: true; path: string }
    | { ok: false; failure: ResolutionFailure };
