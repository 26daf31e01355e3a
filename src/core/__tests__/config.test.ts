import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import path from 'path';
import { loadConfig } from '../config.js';
import { makeTempDir, removeDir } from './helpers.js';

describe('loadConfig', () => {
    let tmp: string;
    let file: string;

    beforeEach(() => {
        tmp = makeTempDir();
        file = path.join(tmp, '.robotics-uri.yml');
    });

    afterEach(() => {
        removeDir(tmp);
    });

    const sample = [
        'searchPaths:',
        '  - models',
        '  - /opt/robots',
        'envVars: MY_ROBOT_PATH',
        'profiles:',
        '  sim:',
        '    searchPaths: sim-models',
        ''
    ].join('\n');

    it('resolves search paths against the config file directory', () => {
        writeFileSync(file, sample);

        expect(loadConfig(file)).toEqual({
            config: {
                searchPaths: [path.join(tmp, 'models'), path.resolve('/opt/robots')],
                envVars: ['MY_ROBOT_PATH']
            },
            warnings: []
        });
    });

    it('appends the selected profile', () => {
        writeFileSync(file, sample);

        expect(loadConfig(file, 'sim').config.searchPaths).toEqual([
            path.join(tmp, 'models'),
            path.resolve('/opt/robots'),
            path.join(tmp, 'sim-models')
        ]);
    });

    it('warns about an unknown profile', () => {
        writeFileSync(file, sample);

        expect(loadConfig(file, 'real').warnings).toEqual([`Profile "real" not found in ${file}`]);
    });

    it('returns an empty config when the file is missing', () => {
        expect(loadConfig(file)).toEqual({ config: { searchPaths: [], envVars: [] }, warnings: [] });
    });

    it('warns when an explicitly named file is missing', () => {
        expect(loadConfig(file, undefined, true)).toEqual({
            config: { searchPaths: [], envVars: [] },
            warnings: [`Config file not found at ${file}`]
        });
    });

    it('warns about values of the wrong type', () => {
        writeFileSync(file, 'searchPaths: 3\n');

        expect(loadConfig(file)).toEqual({
            config: { searchPaths: [], envVars: [] },
            warnings: ['"searchPaths" must be a string or a list of strings']
        });
    });

    it('warns about malformed YAML', () => {
        writeFileSync(file, 'searchPaths: [models, other\n');

        const { config, warnings } = loadConfig(file);
        expect(config).toEqual({ searchPaths: [], envVars: [] });
        expect(warnings).toHaveLength(1);
        expect(warnings[0].startsWith(`Failed to parse config file at ${file}: `)).toBe(true);
    });

    it('rejects a document that is not a mapping', () => {
        writeFileSync(file, '- models\n');

        expect(loadConfig(file).warnings).toEqual([`Config file at ${file} must contain a mapping`]);
    });
});
