export type QueryLabel = "in_domain" | "off_domain";

export interface SessionTurn {
  question: string;
  answer: string;
  timestamp: Date;
  label: QueryLabel;
  degraded: boolean;
}

export interface Session {
  id: string;
  turns: SessionTurn[];
  createdAt: Date;
  lastAccessAt: Date;
}

export interface SessionSummary {
  id: string;
  turnCount: number;
  createdAt: Date;
  lastAccessAt: Date;
}

export interface Classification {
  label: QueryLabel;
  inDomain: boolean;
  confidence: number;
  reason: string;
  degraded: boolean;
}
