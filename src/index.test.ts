import { main, reportFailure } from './index';
import { TrackerError } from './helpers/errors';

describe('main', () => {
  it('prints usage and succeeds on --help', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    await expect(main(['--help'])).resolves.toBe(0);
    expect(log).toHaveBeenCalledWith(expect.stringContaining('Usage:'));
    log.mockRestore();
  });

  it('rejects an unknown option before doing any work', async () => {
    await expect(main(['--verbose'])).rejects.toMatchObject({ kind: 'configuration' });
  });
});

describe('reportFailure', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('maps tracker errors to the fatal exit code', () => {
    expect(reportFailure(new TrackerError('Failed to validate 2FA!', 'authentication', 401))).toBe(2);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('authentication error: Failed to validate 2FA!'));
  });

  it('maps anything else to the fatal exit code', () => {
    expect(reportFailure('boom')).toBe(2);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Unexpected error: boom'));
  });
});
