// Centralized key naming so you don't scatter magic strings
export const RKeys = {
  // refresh sessions: one per RT jti
  rtSession: (accountId: string, jti: string) => `rt:${accountId}:${jti}`,
  rtSessionsOf: (accountId: string) => `rt:${accountId}:*`,
  // blacklist for access tokens by jti
  atBlock: (jti: string) => `at:block:${jti}`,
  // rate limit per bucket
  rlBucket: (bucket: string) => `rl:${bucket}`,
};
