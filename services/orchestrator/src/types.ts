export type AgentId = string;
export type SessionId = string;
export type CapabilityTag = string;

export interface AgentRecord {
  agent_id: AgentId;
  display_name: string;
  network_endpoint: string;
  declared_capabilities: CapabilityTag[];
  keywords: string[];
  requires_identity: boolean;
  description?: string;
}
