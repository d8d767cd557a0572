export const ElementType = {
  BusinessProcess: 'BusinessProcess',
  ApplicationComponent: 'ApplicationComponent',
} as const;

export const RelationshipType = {
  Serving: 'Serving',
} as const;

export interface ModelElement {
  readonly id: string;
  /** `xsi:type` tag; unrecognised tags are kept as-is and never matched. */
  readonly type: string;
  readonly name: string;
}

export interface ModelRelationship {
  readonly id?: string;
  readonly source: string;
  readonly target: string;
  readonly type: string;
}

export interface ProcessInfo {
  readonly name: string;
  readonly servingComponent?: string;
}

export interface ProcessAnalysis {
  readonly servedProcesses: readonly ProcessInfo[];
  readonly unservedProcesses: readonly ProcessInfo[];
  /** Component name to the processes it is the first server of, in classification order. */
  readonly appComponentServices: ReadonlyMap<string, readonly string[]>;
}

export interface ModelStats {
  elements: number;
  relationships: number;
  businessProcesses: number;
}
