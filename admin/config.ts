import "dotenv/config";
import * as R from 'runtypes';
import { ConfigError } from './errors';

export type Config = {
  dbPath: string;
  spammyFeedsFile: string;
  debugLevel: number;
};

const NonEmpty = R.String.withConstraint(s => s.trim().length > 0 || 'must not be empty');
const DebugLevel = R.String.withConstraint(
  s => (/^\d+$/.test(s) && +s <= 10) || `must be an integer 0-10, got '${s}'`
);

export const defaults = {
  FEED_DB_PATH: 'mire.db',
  SPAMMY_FEEDS_FILE: 'spammy_feeds.txt',
  DEBUG_LEVEL: '5',
};

function setting<A>(env: NodeJS.ProcessEnv, name: keyof typeof defaults, rt: R.Runtype<A>): A {
  let res = rt.validate(env[name] ?? defaults[name]);
  if (!res.success) {
    throw new ConfigError(`invalid configuration for ${name}: ${res.message}`);
  }
  return res.value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    dbPath: setting(env, 'FEED_DB_PATH', NonEmpty),
    spammyFeedsFile: setting(env, 'SPAMMY_FEEDS_FILE', NonEmpty),
    debugLevel: +setting(env, 'DEBUG_LEVEL', DebugLevel),
  };
}
