import { describe, it, expect } from 'vitest';
import { collectSearchRoots, envVarsFor, splitPathList } from '../roots.js';

describe('splitPathList', () => {
    it('drops empty entries', () => {
        expect(splitPathList('/a::/b:', ':')).toEqual(['/a', '/b']);
    });

    it('returns nothing for unset or empty values', () => {
        expect(splitPathList(undefined, ':')).toEqual([]);
        expect(splitPathList('', ':')).toEqual([]);
    });
});

describe('collectSearchRoots', () => {
    const env = {
        ROS_PACKAGE_PATH: '/r1:/r2',
        AMENT_PREFIX_PATH: '/ament',
        GAZEBO_MODEL_PATH: '/gz',
        ROBOTICS_URI_PATH: '/generic',
        MY_ROBOT_PATH: '/mine'
    };

    it('orders caller directories before every environment variable', () => {
        const roots = collectSearchRoots('package', ['/c1', '/c2'], env, { extraEnvVars: ['MY_ROBOT_PATH'], platform: 'posix' });
        expect(roots).toEqual([
            { path: '/c1', provenance: 'caller' },
            { path: '/c2', provenance: 'caller' },
            { path: '/mine', provenance: 'caller', source: 'MY_ROBOT_PATH' },
            { path: '/r1', provenance: 'env-primary', source: 'ROS_PACKAGE_PATH' },
            { path: '/r2', provenance: 'env-primary', source: 'ROS_PACKAGE_PATH' },
            { path: '/ament', provenance: 'env-alias', source: 'AMENT_PREFIX_PATH' },
            { path: '/gz', provenance: 'env-alias', source: 'GAZEBO_MODEL_PATH' },
            { path: '/generic', provenance: 'env-generic', source: 'ROBOTICS_URI_PATH' }
        ]);
    });

    it('uses the Gazebo variable as primary for model URIs', () => {
        const roots = collectSearchRoots('model', [], env, { platform: 'posix' });
        expect(roots.map(r => r.path)).toEqual(['/gz', '/r1', '/r2', '/ament', '/generic']);
        expect(roots[0].provenance).toBe('env-primary');
    });

    it('splits on semicolons for Windows', () => {
        const roots = collectSearchRoots('package', [], { ROS_PACKAGE_PATH: 'C:\\ros;;D:\\more' }, { platform: 'win32' });
        expect(roots.map(r => r.path)).toEqual(['C:\\ros', 'D:\\more']);
    });

    it('does not split on semicolons for POSIX', () => {
        const roots = collectSearchRoots('package', [], { ROS_PACKAGE_PATH: 'a;b' }, { platform: 'posix' });
        expect(roots.map(r => r.path)).toEqual(['a;b']);
    });

    it('skips empty values and empty caller directories', () => {
        const roots = collectSearchRoots('model', ['', '/only'], { GAZEBO_MODEL_PATH: '', SDF_PATH: undefined }, { platform: 'posix' });
        expect(roots).toEqual([{ path: '/only', provenance: 'caller' }]);
    });

    it('keeps duplicates in order', () => {
        const roots = collectSearchRoots('package', ['/same'], { ROS_PACKAGE_PATH: '/same' }, { platform: 'posix' });
        expect(roots.map(r => r.path)).toEqual(['/same', '/same']);
    });

    it('reads the environment on every call', () => {
        const mutable: Record<string, string | undefined> = { ROS_PACKAGE_PATH: '/before' };
        expect(collectSearchRoots('package', [], mutable, { platform: 'posix' }).map(r => r.path)).toEqual(['/before']);
        mutable.ROS_PACKAGE_PATH = '/after';
        expect(collectSearchRoots('package', [], mutable, { platform: 'posix' }).map(r => r.path)).toEqual(['/after']);
    });
});

describe('envVarsFor', () => {
    it('lists variables in precedence order', () => {
        expect(envVarsFor('model')).toEqual([
            'GAZEBO_MODEL_PATH',
            'GZ_SIM_RESOURCE_PATH',
            'IGN_GAZEBO_RESOURCE_PATH',
            'SDF_PATH',
            'ROS_PACKAGE_PATH',
            'AMENT_PREFIX_PATH',
            'ROBOTICS_URI_PATH'
        ]);
    });
});
