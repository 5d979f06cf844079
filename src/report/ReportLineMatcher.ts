export interface ReportLineMatch {
  /** Text before the path's last colon, usually the drive letter */
  drive: string
  /** Text between that colon and the size token */
  remainder: string
  /** `${drive}:${remainder}`, the key the directory is stored under */
  path: string
  /** Contents of the bracketed size token, e.g. "3.2MB" */
  formattedSize: string
}

/**
 * Match a folder line of a "grouped by folder" report:
 *
 *   C:\Users\me\Documents [3.2MB]
 *
 * The size token runs from the last " [" to the last "]" after it, and the
 * path is everything before it split at its last colon. Text after the
 * closing bracket is ignored. Returns null for any other line.
 */
export function matchReportLine(line: string): ReportLineMatch | null {
  const close = line.lastIndexOf(']')
  if (close < 2) return null

  const open = line.lastIndexOf(' [', close - 2)
  if (open < 0) return null

  const prefix = line.slice(0, open)
  const colon = prefix.lastIndexOf(':')
  if (colon < 0) return null

  const drive = prefix.slice(0, colon)
  const remainder = prefix.slice(colon + 1)

  return {
    drive,
    remainder,
    path: `${drive}:${remainder}`,
    formattedSize: line.slice(open + 2, close),
  }
}
