/**
 * Signal from the tracker that an account went over one of its limits.
 * Not an error: the controller turns it into a quota lock.
 */
export interface QuotaBreach {
  accountId: string
  usageBytes: number
  quotaBytes: number | null
  usageLoginCount: number
  quotaLoginCount: number | null
  detectedAt: Date
}
