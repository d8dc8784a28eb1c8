import { errorCode } from '../errors.js';

/**
 * Whether a process with `pid` currently exists.
 *
 * Signal 0 performs the existence check without delivering anything. `EPERM`
 * means the process exists but belongs to another user.
 */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === 'EPERM';
  }
}
