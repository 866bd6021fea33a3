/**
 * Markers the agent writes to rhsm.log. Pattern strings are regular
 * expression sources matched case-insensitively unless noted.
 */

export const LOG_MARKERS = {
  /** Any debug-level line: [virtwho.main DEBUG] */
  DEBUG: '\\[.*DEBUG\\]',
  /** Oneshot mode finished its single report */
  ONESHOT: "Thread '.*' stopped after running once",
  TERMINATED: 'virt-who terminated',
  /** Subscription backend throttled the agent */
  RATE_LIMITED: 'status=429',
  /** Subscription backend failed with a 500 */
  SERVER_ERROR: 'RemoteServerException: Server error attempting a GET.*returned status 500',
  /** Error-tagged line: [virtwho.main ERROR] */
  ERROR: '\\[.*ERROR.*\\]',
  /** Warning-tagged line: [virtwho.main WARNING] */
  WARNING: '\\[.*WARNING.*\\]',
} as const;

/** Capture patterns for single values */
export const CAPTURES = {
  REPORTER_ID: /reporter_id='(.*?)'/,
  INTERVAL: /Starting infinite loop with(.*?)seconds interval/,
  REPORT_CONFIG: /Report for config "(.*?)"/,
  CLOCK_TIME: /(\d{2}):(\d{2}):(\d{2})/,
  ORG: /Host-to-guest mapping being sent to '(.*?)'/g,
} as const;

/** Fragments located with plain substring search */
export const PHRASES = {
  REPORT_FOR_CONFIG: 'Report for config',
  PLACING_IN_DATASTORE: 'placing in datastore',
  DOMAIN_INFO: 'Domain info: ',
  MAPPING_SENT_TO: 'Host-to-guest mapping being sent to',
} as const;

/** A line opening with a date, i.e. the start of the next log record */
export const RECORD_START = /^\d{4}/;

export function datastoreKey(configName: string): string {
  return `Report for config "${configName}" gathered, placing in datastore`;
}
