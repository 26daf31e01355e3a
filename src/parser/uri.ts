import { PackageScheme, ParseResult, ParsedUri } from '../types/uri.js';

export const PACKAGE_SCHEMES: readonly PackageScheme[] = ['package', 'model'];

const SCHEME_SEPARATOR = '://';

function isPackageScheme(scheme: string): scheme is PackageScheme {
    return PACKAGE_SCHEMES.some(known => known === scheme);
}

function parseFileUri(uri: string): ParseResult {
    // Always rooted: file:///a, file://a and file:/a all name /a
    const filePath = '/' + uri.slice('file:'.length).replace(/^\/+/, '');
    if (filePath === '/') {
        return {
            ok: false,
            failure: { code: 'MISSING_PACKAGE_NAME', uri, message: `URI "${uri}" does not name a file` }
        };
    }
    return { ok: true, uri: { scheme: 'file', path: filePath, raw: uri } };
}

/**
 * Splits a `package://` or `model://` URI into its package name and sub-path segments.
 * Names and segments are taken literally: no percent-decoding and no `.`/`..` handling.
 * Empty segments (`pkg//a`, trailing `/`) are dropped.
 */
export function parseUri(uri: string): ParseResult {
    if (uri.startsWith('file:')) {
        return parseFileUri(uri);
    }

    const separatorIndex = uri.indexOf(SCHEME_SEPARATOR);
    if (separatorIndex === -1) {
        return {
            ok: false,
            failure: {
                code: 'UNSUPPORTED_SCHEME',
                uri,
                message: `URI "${uri}" has no scheme, expected one of package://, model://, file://`
            }
        };
    }

    const scheme = uri.substring(0, separatorIndex);
    if (!isPackageScheme(scheme)) {
        return {
            ok: false,
            failure: {
                code: 'UNSUPPORTED_SCHEME',
                uri,
                scheme,
                message: `URI "${uri}" uses unsupported scheme "${scheme}"`
            }
        };
    }

    const rest = uri.substring(separatorIndex + SCHEME_SEPARATOR.length);
    const slashIndex = rest.indexOf('/');
    const packageName = slashIndex === -1 ? rest : rest.substring(0, slashIndex);
    if (packageName === '') {
        return {
            ok: false,
            failure: { code: 'MISSING_PACKAGE_NAME', uri, message: `URI "${uri}" does not name a ${scheme}` }
        };
    }

    const subPath = slashIndex === -1
        ? []
        : rest.substring(slashIndex + 1).split('/').filter(segment => segment !== '');

    return { ok: true, uri: { scheme, packageName, subPath, raw: uri } };
}

export function formatUri(uri: ParsedUri): string {
    if (uri.scheme === 'file') {
        return `file://${uri.path}`;
    }
    const tail = uri.subPath.length > 0 ? '/' + uri.subPath.join('/') : '';
    return `${uri.scheme}${SCHEME_SEPARATOR}${uri.packageName}${tail}`;
}
