import {
  formatEntryLine,
  parseEntryLine,
  parseMarker,
  rollbackMarkerAction,
  runBeginAction,
  validateRecordFields,
} from '../../src/domain/transaction';

describe('transaction line codec', () => {
  test('formats timestamp, action and command with the delimiter', () => {
    expect(formatEntryLine('2026-03-01T10:00:00.000Z', 'Created user: devuser', "userdel -r 'devuser'")).toBe(
      "2026-03-01T10:00:00.000Z|Created user: devuser|userdel -r 'devuser'",
    );
  });

  test('the command keeps any further delimiters', () => {
    expect(parseEntryLine('2026-03-01T10:00:00Z|Added cron job|crontab -l | grep -v backup | crontab -', 7)).toEqual({
      timestamp: '2026-03-01T10:00:00Z',
      action: 'Added cron job',
      rollbackCommand: 'crontab -l | grep -v backup | crontab -',
      line: 7,
    });
  });

  test('malformed lines parse to null', () => {
    expect(parseEntryLine('no delimiters here', 1)).toBeNull();
    expect(parseEntryLine('2026-03-01T10:00:00Z|only action', 1)).toBeNull();
    expect(parseEntryLine('yesterday|action|command', 1)).toBeNull();
    expect(parseEntryLine('2026-03-01T10:00:00Z||command', 1)).toBeNull();
    expect(parseEntryLine('2026-03-01T10:00:00Z|action|', 1)).toBeNull();
  });
});

describe('validateRecordFields', () => {
  test('accepts a single-line action and command', () => {
    expect(validateRecordFields('Installed package: git', "apt-get remove -y 'git'")).toBeNull();
  });

  test('rejects empty, delimited and multi-line fields', () => {
    expect(validateRecordFields('  ', 'true')?.code).toBe('ARGUMENT.EMPTY_FIELD');
    expect(validateRecordFields('action', '')?.details).toEqual({ field: 'rollbackCommand' });
    expect(validateRecordFields('a|b', 'true')?.message).toBe('Field "action" is invalid: must not contain "|"');
    expect(validateRecordFields('a\nb', 'true')?.code).toBe('ARGUMENT.INVALID_FIELD');
    expect(validateRecordFields('a', 'x\ny')?.details).toEqual({ field: 'rollbackCommand', reason: 'must be a single line' });
  });
});

describe('markers', () => {
  test('run-begin markers carry the run id', () => {
    expect(parseMarker({ action: runBeginAction('run_1') })).toEqual({ kind: 'run-begin', runId: 'run_1' });
  });

  test('rollback markers carry label and counts', () => {
    expect(rollbackMarkerAction('run_1', 2, 3)).toBe('@rollback run_1 2/3');
    expect(parseMarker({ action: '@rollback all 2/3' })).toEqual({ kind: 'rollback', label: 'all', succeeded: 2, attempted: 3 });
  });

  test('forward entries and malformed markers are not markers', () => {
    expect(parseMarker({ action: 'Installed package: git' })).toBeNull();
    expect(parseMarker({ action: '@rollback all' })).toBeNull();
    expect(parseMarker({ action: '@run-begin ' })).toBeNull();
  });
});
