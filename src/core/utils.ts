import {join} from 'node:path'

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}

/** Replaces a leading `~` or `~/` with `home`. Other paths are returned as-is. */
export function expandHome(path: string, home: string): string {
  if (path === '~') {
    return home
  }

  if (path.startsWith('~/')) {
    return join(home, path.slice(2))
  }

  return path
}

/** First non-empty line of a command's output, trimmed. */
export function firstLine(text: string): string {
  return text.split('\n').map(line => line.trim()).find(line => line.length > 0) ?? ''
}
