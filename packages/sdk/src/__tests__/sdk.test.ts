import { describe, it, expect, beforeEach } from 'vitest';
import {
  ConfigLoadError,
  InvalidAmountError,
  InvalidOperationError,
  UnknownNetworkError,
} from '@scratchpay/core';
import { Scratchpad } from '../sdk.js';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

function writeNetworks(dataDir: string): void {
  fs.mkdirSync(path.join(dataDir, 'data'), { recursive: true });
  fs.writeFileSync(
    path.join(dataDir, 'data', 'networks.json'),
    JSON.stringify({
      rpc_profiles: {
        testnet: { rpc: 'https://rpc.testnet.invalid', explorer: 'https://explorer.testnet.invalid' },
      },
    })
  );
}

describe('Scratchpad', () => {
  let tempDir: string;
  let pad: Scratchpad;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scratchpay-sdk-test-'));
    pad = new Scratchpad({ dataDir: tempDir });
  });

  it('should lay out records, plans and config under the data dir', () => {
    expect(pad.records.directory).toBe(path.join(tempDir, 'records'));
    expect(pad.plans.directory).toBe(path.join(tempDir, 'plans'));
    expect(pad.networksFile).toBe(path.join(tempDir, 'data', 'networks.json'));
  });

  it('should record payloads without a network config', () => {
    const { record, path: recordPath } = pad.recordPayload({ operation: 'mint', target: '0xabc', amount: '3' });

    expect(recordPath).toBe(path.join(tempDir, 'records', `${record.id}.json`));
    expect([...pad.records.listAll()]).toEqual([record]);
  });

  it('should attach the plan text to the record', () => {
    const { record } = pad.recordPayload({ operation: 'swap', target: 'pool', amount: '1' }, 'check slippage');
    expect(pad.records.readStored(`${record.id}.json`).plan).toBe('check slippage');
  });

  it('should write nothing when the amount is malformed', () => {
    expect(() => pad.recordPayload({ operation: 'mint', target: 'x', amount: 'ten' })).toThrow(InvalidAmountError);
    expect(fs.existsSync(pad.records.directory)).toBe(false);
  });

  it('should write nothing for an unknown network', () => {
    writeNetworks(tempDir);

    expect(() =>
      pad.recordPayload({ operation: 'stake', target: 'v1', amount: '1', network: 'mainnet' })
    ).toThrow(UnknownNetworkError);
    expect(fs.existsSync(pad.records.directory)).toBe(false);
  });

  it('should fail with ConfigLoadError when a network is requested without a config file', () => {
    expect(() =>
      pad.recordPayload({ operation: 'stake', target: 'v1', amount: '1', network: 'testnet' })
    ).toThrow(ConfigLoadError);
  });

  it('should report a bad operation before looking for the network config', () => {
    expect(() =>
      pad.recordPayload({ operation: 'burn', target: 'x', amount: '1', network: 'testnet' })
    ).toThrow(InvalidOperationError);
    expect(fs.existsSync(pad.records.directory)).toBe(false);
  });

  it('should report a bad amount before looking for the network config', () => {
    expect(() =>
      pad.recordPayload({ operation: 'mint', target: 'x', amount: 'lots', network: 'testnet' })
    ).toThrow(InvalidAmountError);
    expect(fs.existsSync(pad.records.directory)).toBe(false);
  });

  it('should load the catalog once', () => {
    writeNetworks(tempDir);
    expect(pad.networks()).toBe(pad.networks());
  });

  it('should describe itself', () => {
    expect(pad.describe()).toBe(
      `scratchpay writing records to ${path.join(tempDir, 'records')} and plans to ${path.join(tempDir, 'plans')}, tracking ops mint, swap, stake.`
    );
  });

  it('should describe the selected network', () => {
    writeNetworks(tempDir);
    expect(pad.describe('testnet')).toContain('on testnet using https://rpc.testnet.invalid, tracking ops');
  });
});
