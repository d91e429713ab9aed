export type Ecosystem = 'npm' | 'pip' | 'gradle' | 'nuget';
export type StanzaOrigin = 'manual' | `auto-${Ecosystem}`;

export interface ProjectDescriptor {
  sourceUrl: string;
  upstreamName: string;
  upstreamContactName: string;
  upstreamContactEmail: string;
  thirdpartyFolderPath: string;
}

export interface CopyrightFields {
  year?: string;
  author?: string;
  authorYear?: string;
  copyright?: string;
}

export interface DependencyStanza {
  name: string;
  copyrightLine?: string;
  license: string;
  origin: StanzaOrigin;
  version?: string;
  // descriptor path or tool name, only used in log output
  source: string;
}

export interface DiscoveredPackage extends CopyrightFields {
  name: string;
  license?: string;
  version?: string;
}

export interface ToolResult<T> {
  ok: boolean;
  data?: T;
  error?: string;
  file?: string;
}

export type Failure =
  | { kind: 'MissingRequiredField'; file: string; field: string }
  | { kind: 'UnreadableDescriptor'; file: string; message: string }
  | { kind: 'AdapterUnavailable'; ecosystem: Ecosystem; message: string };

export interface LoadResult {
  stanzas: DependencyStanza[];
  failures: Failure[];
}

export interface GenerateOptions {
  projectPath: string;
  copyrightPath: string;
  outputPath: string;
  list: boolean;
  disabled: Record<Ecosystem, boolean>;
}
