import { join } from 'node:path';
import { homedir } from 'node:os';

export function getConfigDir(): string {
  return process.env.XDG_CONFIG_HOME
    ? join(process.env.XDG_CONFIG_HOME, 'tapsmith')
    : join(homedir(), '.config', 'tapsmith');
}

/** Default state directory; runs live under `<dataDir>/runs`. */
export function getDataDir(): string {
  return process.env.XDG_DATA_HOME
    ? join(process.env.XDG_DATA_HOME, 'tapsmith')
    : join(homedir(), '.local', 'share', 'tapsmith');
}
