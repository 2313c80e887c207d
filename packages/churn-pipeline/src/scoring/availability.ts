/**
 * Scoring process availability check
 *
 * Answers "could a run start right now": the command resolves to an
 * executable and every script argument it is given exists. Does not start
 * the process.
 */

import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import { delimiter, isAbsolute, join, resolve } from 'node:path';
import type { ScorerProcessConfig } from './orchestrator.js';

export interface ScorerAvailability {
  readonly available: boolean;
  readonly command: string;
  /** Resolved executable path when found */
  readonly resolvedPath?: string;
  readonly reason?: string;
}

const SCRIPT_EXTENSIONS = ['.py', '.js', '.mjs', '.cjs', '.ts', '.sh', '.r', '.jl'];

export async function checkScorerAvailability(
  config: Pick<ScorerProcessConfig, 'command' | 'args' | 'cwd'>,
  pathEnv: string = process.env.PATH ?? ''
): Promise<ScorerAvailability> {
  const cwd = config.cwd ?? process.cwd();
  const resolvedPath = await resolveExecutable(config.command, cwd, pathEnv);

  if (resolvedPath === null) {
    return {
      available: false,
      command: config.command,
      reason: `Command not found or not executable: ${config.command}`,
    };
  }

  for (const arg of config.args) {
    if (!looksLikeScript(arg)) continue;
    const scriptPath = isAbsolute(arg) ? arg : resolve(cwd, arg);
    if (!(await canAccess(scriptPath, constants.R_OK))) {
      return {
        available: false,
        command: config.command,
        resolvedPath,
        reason: `Scoring script not found: ${scriptPath}`,
      };
    }
  }

  return { available: true, command: config.command, resolvedPath };
}

async function resolveExecutable(command: string, cwd: string, pathEnv: string): Promise<string | null> {
  if (command.trim() === '') return null;

  if (command.includes('/') || command.includes('\\')) {
    const candidate = isAbsolute(command) ? command : resolve(cwd, command);
    return (await canAccess(candidate, constants.X_OK)) ? candidate : null;
  }

  for (const dir of pathEnv.split(delimiter)) {
    if (dir === '') continue;
    const candidate = join(dir, command);
    if (await canAccess(candidate, constants.X_OK)) {
      return candidate;
    }
  }
  return null;
}

function looksLikeScript(arg: string): boolean {
  if (arg.startsWith('-') || arg.includes('{input}') || arg.includes('{output}')) return false;
  const lower = arg.toLowerCase();
  return SCRIPT_EXTENSIONS.some((extension) => lower.endsWith(extension));
}

async function canAccess(path: string, mode: number): Promise<boolean> {
  try {
    await access(path, mode);
    return true;
  } catch {
    return false;
  }
}
