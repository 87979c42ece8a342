/**
 * Incident feed source backed by the Twitter v1.1 user timeline
 */

import { TwitterApi, type TweetV1, type TweetV1UserTimelineParams } from 'twitter-api-v2';
import { isValid, parse } from 'date-fns';
import { SourceError } from '../errors';
import type { Message } from '../types';

/**
 * A paginated feed of messages. Both calls return one page; an empty page
 * means there is nothing more in that direction.
 */
export interface MessageSource {
  /** Messages strictly newer than sinceId (all recent messages when omitted) */
  fetchSince(account: string, sinceId?: bigint): Promise<Message[]>;
  /** Messages with an id at or below maxId (all recent messages when omitted) */
  fetchUntil(account: string, maxId?: bigint): Promise<Message[]>;
}

export interface TwitterCredentials {
  appKey: string;
  appSecret: string;
  accessToken: string;
  accessSecret: string;
}

// e.g. "Wed Oct 10 20:19:24 +0000 2018"
const TWEET_DATE_FORMAT = 'EEE MMM dd HH:mm:ss xx yyyy';

export function parseTweetTimestamp(createdAt: string): Date {
  const date = parse(createdAt, TWEET_DATE_FORMAT, new Date());
  if (!isValid(date)) {
    throw new SourceError(`Unrecognized tweet timestamp: "${createdAt}"`);
  }
  return date;
}

export function toMessage(tweet: TweetV1): Message {
  const id = BigInt(tweet.id_str);
  try {
    return {
      id,
      text: tweet.full_text ?? tweet.text,
      createdAt: parseTweetTimestamp(tweet.created_at),
    };
  } catch (error) {
    if (error instanceof SourceError) {
      throw new SourceError(error.message, { messageId: id, cause: error });
    }
    throw error;
  }
}

export class TwitterTimelineSource implements MessageSource {
  private readonly client: TwitterApi;

  constructor(credentials: TwitterCredentials, private readonly pageSize?: number) {
    this.client = new TwitterApi(credentials);
  }

  fetchSince(account: string, sinceId?: bigint): Promise<Message[]> {
    return this.fetchPage(account, sinceId === undefined ? {} : { since_id: sinceId.toString() });
  }

  fetchUntil(account: string, maxId?: bigint): Promise<Message[]> {
    return this.fetchPage(account, maxId === undefined ? {} : { max_id: maxId.toString() });
  }

  private async fetchPage(account: string, bounds: Partial<TweetV1UserTimelineParams>): Promise<Message[]> {
    const params: Partial<TweetV1UserTimelineParams> = { ...bounds, tweet_mode: 'extended' };
    if (this.pageSize !== undefined) {
      params.count = this.pageSize;
    }

    let tweets: TweetV1[];
    try {
      const timeline = await this.client.readOnly.v1.userTimelineByUsername(account, params);
      tweets = timeline.tweets;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SourceError(`Timeline request for @${account} failed: ${reason}`, { cause: error });
    }

    return tweets.map(toMessage);
  }
}
