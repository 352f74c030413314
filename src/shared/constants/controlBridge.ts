import os from 'os';
import path from 'path';

const PIPE_NAME = 'snare-control';

export function getControlBridgePath(customPath?: string): string {
  if (customPath) {
    return customPath;
  }

  if (process.platform === 'win32') {
    return `\\\\.\\pipe\\${PIPE_NAME}`;
  }

  return path.join(os.tmpdir(), `${PIPE_NAME}.sock`);
}
