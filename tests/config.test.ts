import { describe, it, expect } from 'vitest';
import { DEFAULT_ACCOUNT, loadConfig, resolveDuckDBPath } from '../lib/config';
import { ConfigError } from '../lib/errors';

const baseEnv = {
    TWITTER_CONSUMER_KEY: 'test-key',
    TWITTER_CONSUMER_SECRET: 'test-secret',
    TWITTER_APP_TOKEN: 'test-token',
    TWITTER_APP_SECRET: 'test-token-secret',
};

describe('loadConfig', () => {
    it('should read credentials and apply defaults', () => {
        const config = loadConfig(baseEnv, '/srv/ingest');

        expect(config).toEqual({
            twitter: {
                appKey: 'test-key',
                appSecret: 'test-secret',
                accessToken: 'test-token',
                accessSecret: 'test-token-secret',
            },
            account: DEFAULT_ACCOUNT,
            pageSize: undefined,
            duckdbPath: '/srv/ingest/data/incidents.duckdb',
        });
    });

    it('should honor overrides', () => {
        const config = loadConfig(
            { ...baseEnv, INCIDENTS_ACCOUNT: 'Other_Feed', TWITTER_PAGE_SIZE: '200', DUCKDB_PATH: '/var/db/fire.duckdb' },
            '/srv/ingest'
        );

        expect(config.account).toBe('Other_Feed');
        expect(config.pageSize).toBe(200);
        expect(config.duckdbPath).toBe('/var/db/fire.duckdb');
    });

    it('should list every missing credential', () => {
        let error: unknown;
        try {
            loadConfig({ TWITTER_CONSUMER_KEY: 'test-key', TWITTER_APP_TOKEN: '  ' });
        } catch (e) {
            error = e;
        }

        expect(error).toBeInstanceOf(ConfigError);
        expect(error).toMatchObject({
            issues: [
                'TWITTER_CONSUMER_SECRET is required',
                'TWITTER_APP_TOKEN is required',
                'TWITTER_APP_SECRET is required',
            ],
        });
    });

    it('should reject an out of range page size', () => {
        expect(() => loadConfig({ ...baseEnv, TWITTER_PAGE_SIZE: '500' })).toThrow(
            'TWITTER_PAGE_SIZE must be between 1 and 200'
        );
    });
});

describe('resolveDuckDBPath', () => {
    it('should resolve relative paths against the working directory', () => {
        expect(resolveDuckDBPath('tmp/x.duckdb', '/home/app')).toBe('/home/app/tmp/x.duckdb');
    });

    it('should keep absolute paths', () => {
        expect(resolveDuckDBPath('/data/x.duckdb', '/home/app')).toBe('/data/x.duckdb');
    });
});
