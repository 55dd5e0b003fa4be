import { DEFAULT_REQUEST_TIMEOUT, getInputs } from '../config';

describe('getInputs', () => {
  const originalEnv = process.env;

  const setInputs = (inputs: Record<string, string>): void => {
    for (const [name, value] of Object.entries(inputs)) {
      process.env[`INPUT_${name.toUpperCase()}`] = value;
    }
  };

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('INPUT_') || key.endsWith('_DEBUG')) {
        delete process.env[key];
      }
    }
    process.env.GITHUB_REPOSITORY_OWNER = 'Acme';
    jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    process.env = originalEnv;
    jest.restoreAllMocks();
  });

  it('should apply defaults', () => {
    setInputs({ command: 'update' });

    const inputs = getInputs();

    expect(inputs.command).toBe('update');
    expect(inputs.inventoryPath).toBe('images.json');
    expect(inputs.probeTimeout).toBe(5000);
    expect(inputs.requestTimeout).toBe(DEFAULT_REQUEST_TIMEOUT);
    expect(inputs.credentials).toBeUndefined();
    expect(inputs.mirrorConfig).toEqual({
      dryRun: false,
      architectures: ['amd64', 'arm64'],
      destinationRegistry: 'ghcr.io',
      destinationPrefix: 'acme/image-mirror-',
      toleratedStatuses: [403, 404],
      concurrency: 1,
      verbose: false,
    });
    expect(inputs.logger.verbose).toBe(false);
  });

  it('should read every input', () => {
    setInputs({
      command: 'sync',
      inventory: 'mirror/images.json',
      'dry-run': 'true',
      architectures: 'arm64/v8',
      'destination-registry': 'https://registry.example.com/',
      'destination-prefix': 'platform/mirror-',
      'tolerated-statuses': '404',
      'probe-timeout': '2500',
      'request-timeout': '30000',
      concurrency: '4',
      verbose: 'true',
    });

    const inputs = getInputs();

    expect(inputs.command).toBe('sync');
    expect(inputs.inventoryPath).toBe('mirror/images.json');
    expect(inputs.probeTimeout).toBe(2500);
    expect(inputs.requestTimeout).toBe(30000);
    expect(inputs.mirrorConfig).toEqual({
      dryRun: true,
      architectures: ['arm64/v8'],
      destinationRegistry: 'registry.example.com',
      destinationPrefix: 'platform/mirror-',
      toleratedStatuses: [404],
      concurrency: 4,
      verbose: true,
    });
    expect(inputs.logger.verbose).toBe(true);
  });

  it('should pass credentials for the destination registry', () => {
    setInputs({ command: 'sync', 'registry-username': 'mirror-bot', 'registry-password': 'test-password' });

    expect(getInputs().credentials).toEqual({
      registry: 'ghcr.io',
      username: 'mirror-bot',
      password: 'test-password',
    });
  });

  it('should mask the password', () => {
    const write = jest.spyOn(process.stdout, 'write');
    setInputs({ command: 'sync', 'registry-username': 'mirror-bot', 'registry-password': 'test-password' });

    getInputs();

    expect(write).toHaveBeenCalledWith(expect.stringContaining('::add-mask::test-password'));
  });

  it('should require a password with a username', () => {
    setInputs({ command: 'sync', 'registry-username': 'mirror-bot' });

    expect(() => getInputs()).toThrow('registry-password is required when registry-username is provided');
  });

  it('should require the command', () => {
    expect(() => getInputs()).toThrow('Input required and not supplied: command');
  });

  it('should reject an unknown command', () => {
    setInputs({ command: 'prune' });

    expect(() => getInputs()).toThrow('Invalid command: prune');
  });

  it('should need a prefix for sync when the owner is unknown', () => {
    delete process.env.GITHUB_REPOSITORY_OWNER;
    setInputs({ command: 'sync' });

    expect(() => getInputs()).toThrow('destination-prefix is required for sync');
  });

  it('should turn on debug output when the runner debugs', () => {
    process.env.RUNNER_DEBUG = '1';
    setInputs({ command: 'update' });

    const inputs = getInputs();

    expect(inputs.logger.debugMode).toBe(true);
    expect(inputs.mirrorConfig.verbose).toBe(true);
  });

  it('should reject timeouts setTimeout cannot hold', () => {
    setInputs({ command: 'update', 'probe-timeout': '3000000000' });

    expect(() => getInputs()).toThrow('probe-timeout must be at most 2147483647, got: 3000000000');
  });

  it('should reject a non-boolean dry-run', () => {
    setInputs({ command: 'update', 'dry-run': 'maybe' });

    expect(() => getInputs()).toThrow('Input does not meet YAML 1.2 "Core Schema" specification: dry-run');
  });
});
