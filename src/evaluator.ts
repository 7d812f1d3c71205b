import { expiryWarningEvent, renewalEvent } from "./messages.js";
import type { NotificationEvent, SiteConfig, SiteState } from "./types.js";
import { hoursBetween, remainingDays } from "./utils/dates.js";

export const EMPTY_SITE_STATE: SiteState = {
  lastExpiry: null,
  notifiedThresholds: [],
  lastNotificationSent: null
};

/**
 * Outcome of evaluating one fresh probe against a site's prior state.
 *
 * @property events - Renewal notice first, threshold alert second.
 * @property triggeredThreshold - Threshold selected for this expiry, whether or not it fired.
 * @property suppressed - True when a new threshold was held back by the notification interval.
 */
export interface Evaluation {
  readonly state: SiteState;
  readonly events: readonly NotificationEvent[];
  readonly remainingDays: number;
  readonly renewed: boolean;
  readonly triggeredThreshold: number | null;
  readonly suppressed: boolean;
}

/**
 * Pick the smallest configured threshold that the remaining days fall within.
 *
 * With thresholds [30, 15, 7, 3, 1] and 5 days left, 7 is selected.
 *
 * @returns The threshold, or null when the certificate is outside every window.
 */
export function selectThreshold(alertDays: readonly number[], daysLeft: number): number | null {
  let selected: number | null = null;
  for (const threshold of alertDays) {
    if (daysLeft <= threshold && (selected === null || threshold < selected)) {
      selected = threshold;
    }
  }
  return selected;
}

/**
 * Advance a site's expiry-tracking state for a newly probed certificate expiry.
 *
 * Never throws and never mutates `prior`.
 */
export function evaluateSite(site: SiteConfig, prior: SiteState, currentExpiry: Date, now: Date): Evaluation {
  const events: NotificationEvent[] = [];
  const daysLeft = remainingDays(currentExpiry, now);

  const renewed = prior.lastExpiry !== null && currentExpiry.getTime() > prior.lastExpiry.getTime();
  let notifiedThresholds = renewed ? [] : [...prior.notifiedThresholds];
  let lastNotificationSent = prior.lastNotificationSent;
  if (renewed) {
    events.push(renewalEvent(site, currentExpiry, daysLeft));
  }

  const triggeredThreshold = selectThreshold(site.alertDays, daysLeft);
  let suppressed = false;

  if (triggeredThreshold !== null && !notifiedThresholds.includes(triggeredThreshold)) {
    const withinInterval =
      lastNotificationSent !== null && hoursBetween(lastNotificationSent, now) < site.notificationIntervalHours;
    if (withinInterval) {
      suppressed = true;
    } else {
      events.push(expiryWarningEvent(site, currentExpiry, daysLeft, triggeredThreshold));
      notifiedThresholds = [...notifiedThresholds, triggeredThreshold];
      lastNotificationSent = now;
    }
  }

  return {
    state: {
      lastExpiry: currentExpiry,
      notifiedThresholds,
      lastNotificationSent
    },
    events,
    remainingDays: daysLeft,
    renewed,
    triggeredThreshold,
    suppressed
  };
}
