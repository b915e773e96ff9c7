import { format } from 'date-fns'
import {
  FixedPeriod,
  InvalidWindowError,
  ReportPeriod,
  ReportWindow,
  WindowRequest,
} from '../contracts'

export type Clock = () => Date

export const systemClock: Clock = () => new Date()

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss'

const PERIOD_DURATIONS_MS: Record<FixedPeriod, number> = {
  tenMin: 10 * 60 * 1000,
  hour: 60 * 60 * 1000,
  day: 24 * 60 * 60 * 1000,
}

const PERIOD_LABELS: Record<FixedPeriod, string> = {
  tenMin: 'Past 10 Minutes',
  hour: 'Past Hour',
  day: 'Past 24 Hours',
}

const PERIOD_TOKENS: Record<string, ReportPeriod> = {
  '10min': 'tenMin',
  'tenmin': 'tenMin',
  'hour': 'hour',
  '1h': 'hour',
  'day': 'day',
  '24h': 'day',
  'custom': 'custom',
}

export function formatTimestamp(date: Date): string {
  return format(date, TIMESTAMP_FORMAT)
}

export function parsePeriod(token: string): ReportPeriod {
  const period = PERIOD_TOKENS[token.trim().toLowerCase()]
  if (!period) {
    throw new InvalidWindowError(
      `Unknown report period "${token}". Use one of: 10min, hour, day, custom`
    )
  }
  return period
}

/**
 * Resolve a period request into a concrete [since, until) window.
 * The clock is read exactly once; the returned window is frozen and should
 * be threaded through polling, analysis and rendering unchanged.
 */
export function resolveWindow(request: WindowRequest, clock: Clock = systemClock): ReportWindow {
  const now = clock()

  if (request.period === 'custom') {
    const until = request.until ?? now
    if (Number.isNaN(request.since.getTime()) || Number.isNaN(until.getTime())) {
      throw new InvalidWindowError('Custom window needs valid since and until timestamps')
    }
    if (request.since.getTime() >= until.getTime()) {
      throw new InvalidWindowError('Custom window start must be before its end')
    }
    return Object.freeze({
      period: 'custom',
      since: new Date(request.since.getTime()),
      until: new Date(until.getTime()),
      label: `Since ${formatTimestamp(request.since)} to ${formatTimestamp(until)}`,
    })
  }

  return Object.freeze({
    period: request.period,
    since: new Date(now.getTime() - PERIOD_DURATIONS_MS[request.period]),
    until: new Date(now.getTime()),
    label: PERIOD_LABELS[request.period],
  })
}

export function containsTimestamp(window: ReportWindow, timestamp: Date): boolean {
  const time = timestamp.getTime()
  return time >= window.since.getTime() && time < window.until.getTime()
}
