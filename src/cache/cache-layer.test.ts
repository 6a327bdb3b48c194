import { expect } from 'chai';
import { MemoryCacheLayer } from './cache-layer.js';

describe('MemoryCacheLayer', () => {
  let now: number;
  let cache: MemoryCacheLayer;

  beforeEach(() => {
    now = 1_000;
    cache = new MemoryCacheLayer(() => now);
  });

  it('returns undefined for unknown keys', async () => {
    expect(await cache.get('oauth2:facebook:state:unknown')).to.equal(undefined);
  });

  it('returns values until their TTL has passed', async () => {
    await cache.set('oauth2:facebook:state:s1', 'test-state', 5);

    now = 5_999;
    expect(await cache.get('oauth2:facebook:state:s1')).to.equal('test-state');

    now = 6_000;
    expect(await cache.get('oauth2:facebook:state:s1')).to.equal(undefined);
    expect(cache.size).to.equal(0);
  });

  it('overwrites values and their expiry', async () => {
    await cache.set('key', 'first', 1);
    now = 1_500;
    await cache.set('key', 'second', 1);

    now = 2_200;
    expect(await cache.get('key')).to.equal('second');
    expect(cache.size).to.equal(1);
  });
});
