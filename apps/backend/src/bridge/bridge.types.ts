export type RecordOutcome = 'published' | 'rejected' | 'failed';

export interface BridgeStats {
  published: number;
  rejected: number;
  failed: number;
}
