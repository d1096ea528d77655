export type ComplianceStatus = 'compliant' | 'noncompliant' | 'unknown';

export interface LookupInput {
  /** Notice number, e.g. L0012345678 */
  notice: string;
  /** Last four digits of the taxpayer identification number */
  last4: string;
}

export interface WorkflowResult {
  readonly status: ComplianceStatus;
  readonly message: string;
  readonly screenshotPath: string | null;
  readonly pdfPath: string | null;
  /** Channel that captured the PDF, when one did */
  readonly pdfSource: string | null;
  /** Pages the driver navigated through, in order */
  readonly urls: readonly string[];
  readonly notice: string;
  readonly last4: string;
  readonly startedAt: string;
  readonly finishedAt: string;
}
