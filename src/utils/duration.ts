/**
 * Parse a UPnP time value ("H+:MM:SS" with optional fraction) into seconds.
 * NOT_IMPLEMENTED, empty and unparseable values give undefined.
 */
export function parseDuration(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const match = value.trim().match(/^(\d+):([0-5]?\d):([0-5]?\d)(\.\d+)?$/);
  if (!match) {
    return undefined;
  }
  const [, hours = '0', minutes = '0', seconds = '0'] = match;
  return parseInt(hours, 10) * 3600 + parseInt(minutes, 10) * 60 + parseInt(seconds, 10);
}

/**
 * Format seconds as HH:MM:SS for Seek(REL_TIME)
 */
export function formatDuration(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const seconds = whole % 60;
  return [hours, minutes, seconds].map(part => String(part).padStart(2, '0')).join(':');
}
