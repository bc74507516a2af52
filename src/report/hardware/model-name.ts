/**
 * Host Model Detection
 *
 * Reads the system model name from the DMI tables. dmidecode needs root,
 * so the command runs through sudo and a failure is fatal: there is no
 * fallback model name.
 */

import { execSync } from 'node:child_process';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { CommandExecutionError } from '../errors.js';

const log = createSubsystemLogger('report/hardware');

export const DEFAULT_MODEL_COMMAND = "sudo dmidecode -t 1 | grep Version | awk '{print $2}'";

export function getModelName(command: string = DEFAULT_MODEL_COMMAND): string {
  try {
    return execSync(command, { encoding: 'utf8', stdio: ['ignore', 'pipe', 'pipe'] }).trim();
  } catch (error) {
    log.error('Failed to read host model name', {
      command,
      error: error instanceof Error ? error.message : String(error),
    });
    throw new CommandExecutionError(command, error);
  }
}
