import * as R from 'runtypes';

// Rows as the feed reader stores them. The scripts never write these, they
// only read them and (for a purge) delete them.

export const Id = R.Number.withConstraint(n => Number.isInteger(n) || `not an integer id: ${n}`);

export const Feed = R.Record({
  id: Id,
  url: R.String,
});
export type Feed = R.Static<typeof Feed>;

export const User = R.Record({
  id: Id,
  username: R.String,
});
export type User = R.Static<typeof User>;

export const Count = R.Record({
  n: R.Number,
});

export type UserDataCounts = {
  subscriptions: number;
  postReads: number;
  // undefined when the store predates the user_preferences table
  preferences?: number;
};

export type DeletedRows = {
  users: number;
  subscriptions: number;
  postReads: number;
  preferences: number;
};

export type DomainGroup = {
  domain: string;
  urls: string[];
};

export type RecentFeedsExport = {
  cutoff: string;
  days: number;
  spammyFeeds: string[];
  urls: string[];
  domains: DomainGroup[];
};
