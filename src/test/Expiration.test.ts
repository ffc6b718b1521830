import test from 'node:test';
import assert from 'node:assert/strict';
import { computeExpiration, isExpired, partitionByExpiration } from '../storage/Expiration';
import { InvalidTtlError } from '../common/Errors';
import { StoreSnapshot } from '../common/Types';

const NOW = 1_000_000;

test('missing or zero TTL never expires', () => {
  assert.equal(computeExpiration(undefined, NOW), null);
  assert.equal(computeExpiration(null, NOW), null);
  assert.equal(computeExpiration(0, NOW), null);
});

test('TTL minutes become an absolute epoch second', () => {
  assert.equal(computeExpiration(5, NOW), NOW + 300);
  assert.equal(computeExpiration(0.5, NOW), NOW + 30);
  assert.equal(computeExpiration(1 / 60, NOW), NOW + 1);
});

test('negative TTL yields an expiration in the past', () => {
  assert.equal(computeExpiration(-1, NOW), NOW - 60);
});

test('non-finite TTL is rejected', () => {
  assert.throws(() => computeExpiration(Number.NaN, NOW), InvalidTtlError);
  assert.throws(() => computeExpiration(Number.POSITIVE_INFINITY, NOW), {
    name: 'InvalidTtlError',
    message: 'Invalid TTL: Infinity (must be a finite number of minutes)',
  });
});

test('entry is expired once now reaches its expiration', () => {
  assert.equal(isExpired({ value: 'x', expiration: null }, NOW), false);
  assert.equal(isExpired({ value: 'x', expiration: NOW + 1 }, NOW), false);
  assert.equal(isExpired({ value: 'x', expiration: NOW }, NOW), true);
  assert.equal(isExpired({ value: 'x', expiration: NOW - 1 }, NOW), true);
});

test('partition splits every key into exactly one side', () => {
  const snapshot: StoreSnapshot = {
    forever: { value: 1, expiration: null },
    past: { value: 2, expiration: NOW - 10 },
    boundary: { value: 3, expiration: NOW },
    future: { value: 4, expiration: NOW + 10 },
  };

  const { expired, active } = partitionByExpiration(Object.entries(snapshot), NOW);

  assert.deepEqual(Object.keys(expired).sort(), ['boundary', 'past']);
  assert.deepEqual(Object.keys(active).sort(), ['forever', 'future']);
  assert.deepEqual({ ...expired, ...active }, snapshot);
});

test('partition returns copies of the entries', () => {
  const snapshot: StoreSnapshot = { profile: { value: { name: 'Ada' }, expiration: null } };

  const { active } = partitionByExpiration(Object.entries(snapshot), NOW);
  const copy = active['profile'];
  assert.ok(copy);
  copy.expiration = NOW;

  assert.equal(snapshot['profile']?.expiration, null);
});

test('partition keeps a __proto__ key as an own key', () => {
  const entries = new Map([['__proto__', { value: 'v', expiration: null }]]);

  const { active } = partitionByExpiration(entries, NOW);

  assert.deepEqual(Object.keys(active), ['__proto__']);
  assert.equal(Object.getPrototypeOf(active), Object.prototype);
});
