import { randomUUID } from "node:crypto";
import { Logger } from "../../config/logger";
import { AgentAction, AgentLogEntry } from "../../shared/types/domain.types";
import { readNullableString, readOneOf, readRecord, readString } from "../row-readers";
import { TableClient, TableRow } from "../table.client";

const AGENT_LOGS_TABLE = "agent_logs";

const AGENT_ACTIONS: readonly AgentAction[] = [
  "RESUME_PARSED",
  "CANDIDATE_UPDATED",
  "DOCUMENT_REQUEST_SENT",
  "DOCUMENT_REQUEST_FAILED",
  "DOCUMENTS_SUBMITTED",
  "DOCUMENTS_VERIFIED",
  "DOCUMENTS_REJECTED",
];

export interface AgentLogInput {
  candidateId: string;
  action: AgentAction;
  toolUsed?: string;
  input?: Record<string, unknown>;
  output?: Record<string, unknown>;
  timestamp?: string;
}

export class AgentLogsRepository {
  constructor(
    private readonly logger: Logger,
    private readonly tableClient: TableClient,
  ) {}

  async log(entry: AgentLogInput): Promise<AgentLogEntry> {
    const record: AgentLogEntry = {
      id: randomUUID(),
      candidateId: entry.candidateId,
      action: entry.action,
      toolUsed: entry.toolUsed ?? null,
      input: entry.input ?? {},
      output: entry.output ?? {},
      timestamp: entry.timestamp ?? new Date().toISOString(),
    };
    await this.tableClient.insert(AGENT_LOGS_TABLE, {
      id: record.id,
      candidate_id: record.candidateId,
      action: record.action,
      tool_used: record.toolUsed,
      input: record.input,
      output: record.output,
      timestamp: record.timestamp,
    });
    this.logger.info("Agent action recorded", {
      candidateId: record.candidateId,
      action: record.action,
      toolUsed: record.toolUsed,
    });
    return record;
  }

  async listByCandidate(candidateId: string): Promise<AgentLogEntry[]> {
    const rows = await this.tableClient.selectMany(
      AGENT_LOGS_TABLE,
      { candidate_id: candidateId },
      { orderBy: { column: "timestamp", ascending: false } },
    );
    return rows.map(toEntry);
  }

  async deleteByCandidate(candidateId: string): Promise<void> {
    await this.tableClient.deleteMany(AGENT_LOGS_TABLE, { candidate_id: candidateId });
  }
}

function toEntry(row: TableRow): AgentLogEntry {
  return {
    id: readString(row, "id"),
    candidateId: readString(row, "candidate_id"),
    action: readOneOf(row, "action", AGENT_ACTIONS, "RESUME_PARSED"),
    toolUsed: readNullableString(row, "tool_used"),
    input: readRecord(row, "input"),
    output: readRecord(row, "output"),
    timestamp: readString(row, "timestamp"),
  };
}
