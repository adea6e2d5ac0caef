export type VersionOperator = '<' | '<=' | '>' | '>=' | '==' | '!='

/**
 * Splits a dotted version into numeric segments.
 *
 * Each segment contributes its leading digits; a segment without any counts as
 * zero, so `16.0.0beta` reads as `[16, 0, 0]`.
 */
export function parseVersion(version: string): number[] {
  return version
    .trim()
    .split('.')
    .map((segment) => {
      const digits = /^\d+/.exec(segment)
      return digits ? Number.parseInt(digits[0], 10) : 0
    })
}

/**
 * Dotted-numeric precedence; the shorter version is padded with zeros.
 */
export function compareVersions(left: string, right: string): -1 | 0 | 1 {
  const a = parseVersion(left)
  const b = parseVersion(right)
  const length = Math.max(a.length, b.length)

  for (let index = 0; index < length; index += 1) {
    const x = a[index] ?? 0
    const y = b[index] ?? 0
    if (x < y) return -1
    if (x > y) return 1
  }

  return 0
}

export function versionCompare(left: string, right: string, operator: VersionOperator): boolean {
  const order = compareVersions(left, right)

  switch (operator) {
    case '<':
      return order < 0
    case '<=':
      return order <= 0
    case '>':
      return order > 0
    case '>=':
      return order >= 0
    case '==':
      return order === 0
    case '!=':
      return order !== 0
  }
}
