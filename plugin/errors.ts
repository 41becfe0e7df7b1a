import type { ZodIssue } from 'zod'

export type TabBarErrorCode =
  | 'INVALID_HOST_CONFIG'
  | 'INVALID_OVERRIDE'
  | 'COLOR_SCHEME_MISSING'

export class TabBarConfigError extends Error {
  /** Stable code callers can branch on. */
  code: TabBarErrorCode
  /** Validation issues when the failure came from the override schema. */
  issues: ZodIssue[]

  constructor(code: TabBarErrorCode, message: string, issues: ZodIssue[] = []) {
    super(message)
    this.name = 'TabBarConfigError'
    this.code = code
    this.issues = issues
  }
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}
