import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import {
  CratesRegistryClient,
  selectCrateVersion,
  selectNormalDependencies
} from '../../../src/core/registry/crates-registry-client.js';
import { createFakeFetch } from '../../test-helpers.js';

const BASE = 'https://registry.test/api/v1';

describe('selectCrateVersion', () => {
  it('prefers the latest stable version', () => {
    assert.equal(
      selectCrateVersion({ crate: { max_stable_version: '1.2.0', newest_version: '1.3.0-rc.1' } }),
      '1.2.0'
    );
  });

  it('falls back to the newest version', () => {
    assert.equal(selectCrateVersion({ crate: { max_stable_version: null, newest_version: '0.1.0-alpha' } }), '0.1.0-alpha');
  });

  it('rejects unexpected payloads', () => {
    assert.equal(selectCrateVersion(null), undefined);
    assert.equal(selectCrateVersion({ crate: 'serde' }), undefined);
    assert.equal(selectCrateVersion({ crate: {} }), undefined);
  });
});

describe('selectNormalDependencies', () => {
  it('keeps normal dependencies only, sorted and deduplicated', () => {
    assert.deepEqual(
      selectNormalDependencies({
        dependencies: [
          { crate_id: 'serde_derive', kind: 'normal' },
          { crate_id: 'serde_json', kind: 'dev' },
          { crate_id: 'itoa', kind: 'normal' },
          { crate_id: 'itoa', kind: 'normal' },
          { crate_id: 'cc', kind: 'build' },
          { kind: 'normal' }
        ]
      }),
      ['itoa', 'serde_derive']
    );
  });

  it('rejects a payload without a dependency list', () => {
    assert.equal(selectNormalDependencies({ dependencies: 'none' }), undefined);
  });
});

describe('CratesRegistryClient', () => {
  it('fetches the dependencies of the selected version', async () => {
    const fetch = createFakeFetch({
      [`${BASE}/crates/serde`]: { json: { crate: { max_stable_version: '1.0.200' } } },
      [`${BASE}/crates/serde/1.0.200/dependencies`]: {
        json: { dependencies: [{ crate_id: 'serde_derive', kind: 'normal' }, { crate_id: 'serde_test', kind: 'dev' }] }
      }
    });
    const client = new CratesRegistryClient({ baseUrl: `${BASE}/`, fetch });

    assert.deepEqual(await client.dependenciesOf('serde'), ['serde_derive']);
    assert.deepEqual(fetch.calls, [
      `${BASE}/crates/serde`,
      `${BASE}/crates/serde/1.0.200/dependencies`
    ]);
  });

  it('returns null for an unknown package', async () => {
    const client = new CratesRegistryClient({ baseUrl: BASE, fetch: createFakeFetch({}) });

    assert.equal(await client.dependenciesOf('nope'), null);
  });

  it('returns null when the network fails', async () => {
    const fetch = createFakeFetch({ [`${BASE}/crates/serde`]: new Error('connection reset') });
    const client = new CratesRegistryClient({ baseUrl: BASE, fetch });

    assert.equal(await client.dependenciesOf('serde'), null);
  });

  it('returns null when the dependency request fails', async () => {
    const fetch = createFakeFetch({
      [`${BASE}/crates/serde`]: { json: { crate: { max_stable_version: '1.0.0' } } },
      [`${BASE}/crates/serde/1.0.0/dependencies`]: { status: 500, json: {} }
    });
    const client = new CratesRegistryClient({ baseUrl: BASE, fetch });

    assert.equal(await client.dependenciesOf('serde'), null);
  });

  it('returns null for a body that is not JSON', async () => {
    const fetch = createFakeFetch({ [`${BASE}/crates/serde`]: { text: '<html>' } });
    const client = new CratesRegistryClient({ baseUrl: BASE, fetch });

    assert.equal(await client.dependenciesOf('serde'), null);
  });

  it('sends a User-Agent header', async () => {
    const seen: Array<Record<string, string> | undefined> = [];
    const client = new CratesRegistryClient({
      baseUrl: BASE,
      userAgent: 'deptree-tests',
      fetch: async (_input, init) => {
        seen.push(init?.headers);
        return new Response('{}', { status: 200 });
      }
    });

    assert.equal(await client.dependenciesOf('serde'), null);
    assert.equal(seen.length, 1);
    assert.equal(seen[0]?.['User-Agent'], 'deptree-tests');
  });
});
