import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TwitterTimelineSource, parseTweetTimestamp } from '../lib/twitter/timeline';
import { SourceError } from '../lib/errors';

const mocks = vi.hoisted(() => {
    return {
        userTimelineByUsername: vi.fn(),
        credentials: vi.fn(),
    };
});

vi.mock('twitter-api-v2', () => {
    return {
        TwitterApi: class {
            readOnly = {
                v1: {
                    userTimelineByUsername: mocks.userTimelineByUsername,
                },
            };

            constructor(credentials: unknown) {
                mocks.credentials(credentials);
            }
        },
    };
});

const credentials = {
    appKey: 'test-key',
    appSecret: 'test-secret',
    accessToken: 'test-token',
    accessSecret: 'test-token-secret',
};

describe('parseTweetTimestamp', () => {
    it('should parse the v1.1 created_at format', () => {
        expect(parseTweetTimestamp('Wed Oct 10 20:19:24 +0000 2018').toISOString()).toBe('2018-10-10T20:19:24.000Z');
    });

    it('should apply the offset', () => {
        expect(parseTweetTimestamp('Thu Jan 04 09:00:00 +0200 2024').toISOString()).toBe('2024-01-04T07:00:00.000Z');
    });

    it('should reject anything else', () => {
        expect(() => parseTweetTimestamp('2018-10-10T20:19:24Z')).toThrow(SourceError);
    });
});

describe('TwitterTimelineSource', () => {
    beforeEach(() => {
        mocks.userTimelineByUsername.mockReset();
        mocks.credentials.mockReset();
    });

    it('should map tweets to messages without losing id precision', async () => {
        mocks.userTimelineByUsername.mockResolvedValue({
            tweets: [
                {
                    id_str: '1588123456789012345',
                    full_text: 'INC-1\nA St\nFire\nE1',
                    text: 'INC-1\nA St…',
                    created_at: 'Wed Oct 10 20:19:24 +0000 2018',
                },
            ],
        });
        const source = new TwitterTimelineSource(credentials);

        const messages = await source.fetchSince('test_account', 1588000000000000000n);

        expect(mocks.credentials).toHaveBeenCalledWith(credentials);
        expect(mocks.userTimelineByUsername).toHaveBeenCalledWith('test_account', {
            since_id: '1588000000000000000',
            tweet_mode: 'extended',
        });
        expect(messages).toEqual([
            {
                id: 1588123456789012345n,
                text: 'INC-1\nA St\nFire\nE1',
                createdAt: new Date('2018-10-10T20:19:24Z'),
            },
        ]);
    });

    it('should fall back to text when full_text is missing', async () => {
        mocks.userTimelineByUsername.mockResolvedValue({
            tweets: [{ id_str: '5', text: 'short', created_at: 'Wed Oct 10 20:19:24 +0000 2018' }],
        });
        const source = new TwitterTimelineSource(credentials);

        const [msg] = await source.fetchUntil('test_account');

        expect(msg.text).toBe('short');
    });

    it('should send max_id and the page size for backward pages', async () => {
        mocks.userTimelineByUsername.mockResolvedValue({ tweets: [] });
        const source = new TwitterTimelineSource(credentials, 200);

        const messages = await source.fetchUntil('test_account', 41n);

        expect(messages).toEqual([]);
        expect(mocks.userTimelineByUsername).toHaveBeenCalledWith('test_account', {
            max_id: '41',
            tweet_mode: 'extended',
            count: 200,
        });
    });

    it('should omit bounds when none is given', async () => {
        mocks.userTimelineByUsername.mockResolvedValue({ tweets: [] });
        const source = new TwitterTimelineSource(credentials);

        await source.fetchSince('test_account');

        expect(mocks.userTimelineByUsername).toHaveBeenCalledWith('test_account', { tweet_mode: 'extended' });
    });

    it('should wrap request failures in a SourceError', async () => {
        const cause = new Error('Request failed with code 429');
        mocks.userTimelineByUsername.mockRejectedValue(cause);
        const source = new TwitterTimelineSource(credentials);

        const error = await source.fetchSince('test_account').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SourceError);
        expect(error).toMatchObject({
            message: 'Timeline request for @test_account failed: Request failed with code 429',
            cause,
        });
    });

    it('should tag bad timestamps with the tweet id', async () => {
        mocks.userTimelineByUsername.mockResolvedValue({
            tweets: [{ id_str: '77', text: 'x', created_at: 'yesterday' }],
        });
        const source = new TwitterTimelineSource(credentials);

        const error = await source.fetchSince('test_account').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SourceError);
        expect(error).toMatchObject({
            messageId: 77n,
            message: 'Unrecognized tweet timestamp: "yesterday"',
            cause: expect.any(SourceError),
        });
    });
});
