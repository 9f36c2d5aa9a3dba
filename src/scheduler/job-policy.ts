import { z } from "zod"

export type JobName = "historyCommit" | "backup"

export type JobSchedule = {
  cadence: string
  jitterSeconds: number
  persistent: boolean
}

export type JobPolicy = {
  name: JobName
  enabled: boolean
  schedule: JobSchedule
}

const CALENDAR_EXPRESSION_PATTERN = /^[0-9A-Za-z*,:/.~ -]+$/

/**
 * Shape check for calendar expressions (`hourly`, `*:0/5`, `Mon..Fri 09:00`). It rejects
 * empty strings, shell metacharacters and newlines; full evaluation is left to the
 * supervisor that consumes the schedule.
 *
 * @param value Candidate cadence.
 * @returns Whether the value looks like a shorthand keyword or calendar event.
 */
export const isCalendarExpression = (value: string): boolean => {
  const trimmed = value.trim()
  if (trimmed.length === 0) {
    return false
  }

  return CALENDAR_EXPRESSION_PATTERN.test(trimmed)
}

const calendarExpressionSchema = z
  .string()
  .trim()
  .refine(isCalendarExpression, "must be a calendar expression such as 'hourly' or '*:0/5'")

/**
 * Builds the schedule schema with per-job defaults, so a config that only overrides one
 * field keeps the other defaults of that job.
 */
export const createJobScheduleSchema = (defaults: JobSchedule) => {
  return z
    .object({
      cadence: calendarExpressionSchema.default(defaults.cadence),
      jitterSeconds: z
        .number()
        .int("jitterSeconds must be an integer")
        .min(0, "jitterSeconds must be >= 0")
        .default(defaults.jitterSeconds),
      persistent: z.boolean().default(defaults.persistent),
    })
    .strict()
    .default({})
}

export const DEFAULT_HISTORY_SCHEDULE: JobSchedule = {
  cadence: "*:0/5",
  jitterSeconds: 30,
  persistent: true,
}

export const DEFAULT_BACKUP_SCHEDULE: JobSchedule = {
  cadence: "hourly",
  jitterSeconds: 300,
  persistent: true,
}

type JobPolicySource = {
  history: { enable: boolean; schedule: JobSchedule }
  backup: { enable: boolean; schedule: JobSchedule }
}

/**
 * Resolves the scheduling contract handed to the supervisor. Each job keeps an independent
 * cadence; overlap protection is the supervisor's one-instance-per-unit rule.
 *
 * @param source Validated history and backup sections.
 * @returns Policies in a fixed order: history commit first, then backup.
 */
export const resolveJobPolicies = (source: JobPolicySource): JobPolicy[] => {
  return [
    {
      name: "historyCommit",
      enabled: source.history.enable,
      schedule: source.history.schedule,
    },
    {
      name: "backup",
      enabled: source.backup.enable,
      schedule: source.backup.schedule,
    },
  ]
}
