import { ethers } from 'ethers';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  applyEnvOverrides,
  getConfig,
  getPrivateKey,
  loadConfig,
  parseRelayerConfig,
  validateConfig
} from '../config';
import { ConfigError } from '../utils/errors';

const MINIMAL_YAML = `
source:
  name: ethereum
  chainId: 1
  rpcUrl: http://localhost:8545
  bridgeAddress: "0x0000000000000000000000000000000000000901"
destination:
  name: polygon
  chainId: 137
  rpcUrl: http://localhost:8546
  bridgeAddress: "0x0000000000000000000000000000000000000902"
`;

describe('config', () => {
  let tempRoot: string;
  let configPath: string;

  beforeEach(() => {
    tempRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'relayer-config-'));
    configPath = path.join(tempRoot, 'config.yaml');
  });

  afterEach(() => {
    fs.rmSync(tempRoot, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('fills defaults around the chain sections', () => {
      fs.writeFileSync(configPath, MINIMAL_YAML);

      const config = loadConfig({ CONFIG_PATH: configPath });

      expect(config).toEqual({
        pollingIntervalMs: 30_000,
        maxWindowSize: 100,
        confirmationLag: 12,
        startBlock: 'latest',
        checkpoint: { path: './data/relayer-checkpoint.json', dedupCapacity: 10_000 },
        backoff: { initialDelayMs: 1_000, maxDelayMs: 60_000 },
        source: {
          name: 'ethereum',
          chainId: 1,
          rpcUrl: 'http://localhost:8545',
          bridgeAddress: '0x0000000000000000000000000000000000000901',
        },
        destination: {
          name: 'polygon',
          chainId: 137,
          rpcUrl: 'http://localhost:8546',
          bridgeAddress: '0x0000000000000000000000000000000000000902',
          confirmations: 1,
        },
      });
    });

    it('reads every tunable from the file', () => {
      fs.writeFileSync(configPath, `${MINIMAL_YAML}
pollingIntervalMs: 5000
maxWindowSize: 250
confirmationLag: 3
startBlock: 1200
checkpoint:
  path: /var/lib/relayer/state.json
  dedupCapacity: 50
backoff:
  initialDelayMs: 200
  maxDelayMs: 800
`);

      const config = loadConfig({ CONFIG_PATH: configPath });

      expect(config).toMatchObject({
        pollingIntervalMs: 5000,
        maxWindowSize: 250,
        confirmationLag: 3,
        startBlock: 1200,
        checkpoint: { path: '/var/lib/relayer/state.json', dedupCapacity: 50 },
        backoff: { initialDelayMs: 200, maxDelayMs: 800 },
      });
    });

    it('lets the environment override the file', () => {
      fs.writeFileSync(configPath, `${MINIMAL_YAML}\nmaxWindowSize: 250\n`);

      const config = loadConfig({
        CONFIG_PATH: configPath,
        MAX_WINDOW_SIZE: '40',
        START_BLOCK: '77',
        CHECKPOINT_PATH: '/tmp/override.json',
        SOURCE_RPC_URL: 'http://source.internal:8545',
      });

      expect(config.maxWindowSize).toBe(40);
      expect(config.startBlock).toBe(77);
      expect(config.checkpoint).toEqual({ path: '/tmp/override.json', dedupCapacity: 10_000 });
      expect(config.source.rpcUrl).toBe('http://source.internal:8545');
      expect(config.destination.rpcUrl).toBe('http://localhost:8546');
    });

    it('fails when the file is missing', () => {
      expect(() => loadConfig({ CONFIG_PATH: path.join(tempRoot, 'absent.yaml') })).toThrow(
        `Config file not found at ${path.join(tempRoot, 'absent.yaml')}`
      );
    });

    it('fails on YAML that does not parse', () => {
      fs.writeFileSync(configPath, 'source: [unclosed');

      expect(() => loadConfig({ CONFIG_PATH: configPath })).toThrow(ConfigError);
    });
  });

  describe('parseRelayerConfig', () => {
    const base = () => ({
      source: { chainId: 1, rpcUrl: 'http://a', bridgeAddress: '0x0000000000000000000000000000000000000901' },
      destination: { chainId: 137, rpcUrl: 'http://b', bridgeAddress: '0x0000000000000000000000000000000000000902' },
    });

    it('names chains after their side when no name is given', () => {
      const config = parseRelayerConfig(base());

      expect(config.source.name).toBe('source');
      expect(config.destination.name).toBe('destination');
    });

    it('checksums bridge addresses', () => {
      const raw = base();
      raw.source.bridgeAddress = '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd';

      expect(parseRelayerConfig(raw).source.bridgeAddress).toBe(
        ethers.utils.getAddress('0xabcdefabcdefabcdefabcdefabcdefabcdefabcd')
      );
    });

    it('rejects a bridge address that is not an address', () => {
      const raw = base();
      raw.destination.bridgeAddress = '0x1234';

      expect(() => parseRelayerConfig(raw)).toThrow('destination.bridgeAddress is not an address: 0x1234');
    });

    it('rejects a window size below one', () => {
      expect(() => parseRelayerConfig({ ...base(), maxWindowSize: 0 })).toThrow(
        'maxWindowSize must be an integer >= 1, got 0'
      );
    });

    it('rejects a start block that is neither a number nor "latest"', () => {
      expect(() => parseRelayerConfig({ ...base(), startBlock: 'earliest' })).toThrow(ConfigError);
    });

    it('reads a gas limit for the destination', () => {
      const raw = { ...base(), destination: { ...base().destination, gasLimit: 300_000, confirmations: 0 } };

      expect(parseRelayerConfig(raw).destination).toMatchObject({ gasLimit: 300_000, confirmations: 0 });
    });

    it('requires a mapping at the top level', () => {
      expect(() => parseRelayerConfig(['source'])).toThrow('config must be a mapping');
    });
  });

  describe('applyEnvOverrides', () => {
    it('does not modify the document it is given', () => {
      const raw = { source: { rpcUrl: 'http://a' } };

      const merged = applyEnvOverrides(raw, { SOURCE_RPC_URL: 'http://b' });

      expect(merged.source).toEqual({ rpcUrl: 'http://b' });
      expect(raw.source.rpcUrl).toBe('http://a');
    });
  });

  describe('validateConfig', () => {
    it('rejects a relay from a chain to itself', () => {
      fs.writeFileSync(configPath, MINIMAL_YAML.replace('chainId: 137', 'chainId: 1'));

      expect(() => getConfig({ CONFIG_PATH: configPath })).toThrow('Source and destination share chain ID 1');
    });

    it('rejects a backoff ceiling below its first delay', () => {
      fs.writeFileSync(configPath, MINIMAL_YAML);
      const config = loadConfig({ CONFIG_PATH: configPath });
      config.backoff = { initialDelayMs: 5_000, maxDelayMs: 1_000 };

      expect(() => validateConfig(config)).toThrow(ConfigError);
    });
  });

  describe('getPrivateKey', () => {
    const key = '11'.repeat(32);

    it('adds the 0x prefix', () => {
      expect(getPrivateKey({ PRIVATE_KEY: key })).toBe(`0x${key}`);
      expect(getPrivateKey({ PRIVATE_KEY: `0x${key}` })).toBe(`0x${key}`);
    });

    it('requires a key', () => {
      expect(() => getPrivateKey({})).toThrow('PRIVATE_KEY environment variable is required');
    });

    it('rejects a key of the wrong length', () => {
      expect(() => getPrivateKey({ PRIVATE_KEY: '0x1234' })).toThrow('PRIVATE_KEY must be 32 bytes of hex');
    });
  });
});
