/**
 * Caller identity for the emulated account. Credentials are never checked,
 * so every caller is the account root.
 */

import type { ResourceHandler } from '../gateway/types';

export const STS_SERVICE = 'sts';

export const stsHandler: ResourceHandler = {
  name: 'sts',
  service: STS_SERVICE,
  actions: {
    async GetCallerIdentity(_params, ctx) {
      return {
        userId: ctx.accountId,
        account: ctx.accountId,
        arn: `arn:aws:iam::${ctx.accountId}:root`,
      };
    },
  },
};
