import type { ConversationVariableType, EnvironmentVariableType } from '../dsl/constants.js';

export interface NodePosition {
  x: number;
  y: number;
}

export interface NodeData {
  type: string;
  title: string;
  [field: string]: unknown;
}

export interface WorkflowNode {
  id: string;
  type: 'custom';
  data: NodeData;
  position: NodePosition;
  sourcePosition: 'right';
  targetPosition: 'left';
  width?: number;
  height?: number;
}

export interface WorkflowEdge {
  id: string;
  source: string;
  target: string;
  sourceHandle: string;
  targetHandle: string;
  type: 'custom';
  zIndex: number;
}

export interface EnvironmentVariable {
  id: string;
  name: string;
  value_type: EnvironmentVariableType;
  /** Always present, possibly empty, so the runtime never sees a variable without a value. */
  value: string;
  required: boolean;
}

export interface ConversationVariable {
  id: string;
  name: string;
  value_type: ConversationVariableType;
  description: string;
}

export interface NodeSummary {
  id: unknown;
  type: unknown;
  title: unknown;
}
