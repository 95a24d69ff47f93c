/** The slice of a recorded call the quote pipeline reads and writes. */
export interface Call {
  id: string;
  providerCallId: string;
  status: string;
  transcript: string | null;
  extractedData: Record<string, unknown> | null;
  quoteSummary: string | null;
  createdAt: Date;
  updatedAt: Date;
}
