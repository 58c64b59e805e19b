import type { IssueFinding, NormalizedRecord } from '../../domain/types.js';

/** Records sharing one identifier value, in case-file order. */
export interface EntityGroup {
  entityKey: string;
  records: NormalizedRecord[];
}

/** Records of one type inside an entity group that describe the same event. */
export interface EventPartition {
  entityKey: string;
  recordType: NormalizedRecord['recordType'];
  eventKey: string | null;
  records: NormalizedRecord[];
}

export interface ConsistencyReport {
  groupCount: number;
  findings: IssueFinding[];
}
