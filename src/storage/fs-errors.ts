/**
 * errno helpers shared by the file-backed stores.
 *
 * Checks are structural: errors raised by Node's fs may come from another
 * realm (a Jest sandbox, a vm context), where `instanceof Error` is false.
 */

export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function isNotFound(err: unknown): boolean {
  return errnoCode(err) === 'ENOENT';
}

export function isAlreadyExists(err: unknown): boolean {
  return errnoCode(err) === 'EEXIST';
}
