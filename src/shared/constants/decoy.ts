import type { Protocol } from '../types/attack';

export const DEFAULT_HOST = '0.0.0.0';

export const DEFAULT_PORTS: Record<Protocol, number> = {
  ssh: 2222,
  http: 8080,
  ftp: 2121,
};

export const DEFAULT_READ_TIMEOUT_MS = 30_000;

export const SSH_BANNER = 'SSH-2.0-OpenSSH_8.2p1 Ubuntu-4ubuntu0.3\r\n';
export const SSH_READ_SIZE = 1024;

export const HTTP_READ_SIZE = 4096;
export const HTTP_DECOY_RESPONSE =
  'HTTP/1.1 200 OK\r\n' +
  'Server: Apache/2.4.41 (Ubuntu)\r\n' +
  'Content-Type: text/html; charset=UTF-8\r\n' +
  'Content-Length: 44\r\n' +
  'Connection: close\r\n' +
  '\r\n' +
  '<html><body><h1>It works!</h1></body></html>';
export const HTTP_METHODS = new Set([
  'GET',
  'POST',
  'PUT',
  'DELETE',
  'HEAD',
  'OPTIONS',
  'PATCH',
  'TRACE',
  'CONNECT',
]);

export const FTP_BANNER = '220 FTP Server Ready\r\n';
export const FTP_USER_OK = '331 Password required\r\n';
export const FTP_LOGIN_FAILED = '530 Login incorrect\r\n';
export const FTP_NOT_UNDERSTOOD = '500 Command not understood\r\n';
export const FTP_MAX_TURNS = 4;
export const FTP_MAX_LINE_BYTES = 1024;

export const DEFAULT_DANGEROUS_KEYWORDS = [
  'wget',
  'curl',
  'chmod',
  'rm -rf',
  'bash',
  'nc ',
  'python',
  'perl',
];

export const ALERT_DETAIL_PAYLOAD_CHARS = 200;
