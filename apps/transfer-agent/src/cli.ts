import type { TransferDirection } from './runtime/transfer-job.js';

export interface TransferCommand {
  direction: TransferDirection;
  remoteUrl: string;
  localPath: string;
  filename: string;
}

export const USAGE = 'Usage: transfer-agent [download <url> [directory] | upload <url> <directory>/<file>]';

function splitFilePath(path: string): { localPath: string; filename: string } {
  const index = path.lastIndexOf('/');
  const localPath = index === -1 ? '' : path.slice(0, index).replace(/^\/+/, '');
  if (localPath.length === 0) {
    throw new Error(`Uploads need a directory below the transfers root (${path})\n${USAGE}`);
  }
  return { localPath, filename: path.slice(index + 1) };
}

export function filenameFromUrl(remoteUrl: string): string {
  const segment = new URL(remoteUrl).pathname.split('/').filter((part) => part.length > 0).at(-1);
  if (segment === undefined) {
    return 'download';
  }

  let decoded: string;
  try {
    decoded = decodeURIComponent(segment);
  } catch (error) {
    if (!(error instanceof URIError)) {
      throw error;
    }
    return segment;
  }
  return decoded.includes('/') ? segment : decoded;
}

export function parseTransferCommand(args: string[]): TransferCommand | undefined {
  const [command, remoteUrl, target] = args;
  if (command === undefined) {
    return undefined;
  }

  if (command === 'download' && remoteUrl) {
    return {
      direction: 'download',
      remoteUrl,
      localPath: target ?? '/downloads',
      filename: filenameFromUrl(remoteUrl),
    };
  }

  if (command === 'upload' && remoteUrl && target) {
    return { direction: 'upload', remoteUrl, ...splitFilePath(target) };
  }

  throw new Error(USAGE);
}
