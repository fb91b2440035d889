// types/index.ts

// ============================================
// Template Artifact Types (as written on disk)
// ============================================

export type MappingType = 'direct' | 'jsonpath' | 'jsonata' | 'custom';

export type SectionType = 'form-fill' | 'templated-view';

export type IndexPosition = 'before' | 'after';

export interface TemplateDefinition {
  templateId: string;
  description?: string;
  baseTemplateId?: string;
  sections?: SectionDefinition[];
  excludedSections?: string[];
  /** sectionId -> templatePath, applied to inherited sections */
  sectionOverrides?: Record<string, string>;
  includedFragments?: string[];
  headerFooterConfig?: HeaderFooterConfigDefinition;
  metadata?: Record<string, unknown>;
}

export interface SectionDefinition {
  sectionId: string;
  type?: SectionType;
  templatePath?: string;
  mappingType?: MappingType;
  fieldMappings?: Record<string, string>;
  fieldMappingGroups?: FieldMappingGroupDefinition[];
  viewModelType?: string;
  condition?: string;
  overflowConfigs?: OverflowConfigDefinition[];
  order?: number;
}

export interface FieldMappingGroupDefinition {
  mappingType?: MappingType;
  fields?: Record<string, string>;
  basePath?: string;
  repeatingGroup?: RepeatingGroupDefinition;
}

export interface RepeatingGroupDefinition {
  prefix?: string;
  suffix?: string;
  startIndex?: number;
  indexSeparator?: string;
  indexPosition?: IndexPosition;
  maxItems?: number;
  fields: Record<string, string>;
}

export interface OverflowConfigDefinition {
  arrayPath: string;
  mappingType?: MappingType;
  maxItemsInMain: number;
  itemsPerOverflowPage: number;
  addendumTemplatePath: string;
  overflowIndicatorField?: string;
}

export interface HeaderFooterConfigDefinition {
  headers?: HeaderTemplateDefinition[];
  footers?: FooterTemplateDefinition[];
  /** 0-based page indices */
  excludePages?: number[];
}

export interface HeaderTemplateDefinition {
  renderType: string;
  content: string;
  alignment?: string;
  marginTop?: number;
  fontSize?: number;
  data?: Record<string, unknown>;
}

export interface FooterTemplateDefinition {
  renderType: string;
  content: string;
  alignment?: string;
  marginBottom?: number;
  fontSize?: number;
  includePageNumbers?: boolean;
  pageNumberFormat?: string;
  data?: Record<string, unknown>;
}

// ============================================
// Resolved Template Types (frozen after merge)
// ============================================

export type FieldMap = Readonly<Record<string, string>>;

export interface DocumentTemplate {
  readonly templateId: string;
  readonly description?: string;
  readonly baseTemplateId?: string;
  readonly sections: readonly PageSection[];
  readonly headerFooterConfig?: HeaderFooterConfig;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface PageSection {
  readonly sectionId: string;
  readonly type: SectionType;
  readonly templatePath: string;
  readonly mappingType: MappingType;
  readonly fieldMappings: FieldMap;
  readonly fieldMappingGroups: readonly FieldMappingGroup[];
  readonly viewModelType?: string;
  readonly condition?: string;
  readonly overflowConfigs: readonly OverflowConfig[];
  readonly order: number;
}

export interface FieldMappingGroup {
  readonly mappingType: MappingType;
  readonly fields: FieldMap;
  readonly basePath?: string;
  readonly repeatingGroup?: RepeatingGroupConfig;
}

export interface RepeatingGroupConfig {
  readonly prefix: string;
  readonly suffix: string;
  readonly startIndex: number;
  readonly indexSeparator: string;
  readonly indexPosition: IndexPosition;
  readonly maxItems?: number;
  readonly fields: FieldMap;
}

export interface OverflowConfig {
  readonly arrayPath: string;
  readonly mappingType: MappingType;
  readonly maxItemsInMain: number;
  readonly itemsPerOverflowPage: number;
  readonly addendumTemplatePath: string;
  readonly overflowIndicatorField?: string;
}

export interface HeaderFooterConfig {
  readonly headers: readonly HeaderTemplate[];
  readonly footers: readonly FooterTemplate[];
  readonly excludePages: readonly number[];
}

export interface HeaderTemplate {
  readonly renderType: string;
  readonly content: string;
  readonly alignment: string;
  readonly marginTop: number;
  readonly fontSize: number;
  readonly data: Readonly<Record<string, unknown>>;
}

export interface FooterTemplate {
  readonly renderType: string;
  readonly content: string;
  readonly alignment: string;
  readonly marginBottom: number;
  readonly fontSize: number;
  readonly includePageNumbers: boolean;
  readonly pageNumberFormat: string;
  readonly data: Readonly<Record<string, unknown>>;
}

// ============================================
// Data Types
// ============================================

export type DataTree = Record<string, unknown>;

export type FieldValues = Record<string, string>;

/** Object key or array index along a path into a DataTree */
export type PathSegment = string | number;

export interface PageRenderContext {
  /** 1-based */
  pageNumber: number;
  totalPages: number;
  data: DataTree;
}

// ============================================
// Job Bundle Types
// ============================================

export interface JobManifest {
  schema: 'pdf-composer-job/v1';
  templateId: string;
  /** Path of a JSON data file inside the bundle */
  data?: string;
  tables?: Record<string, TableInputSpec>;
}

export interface TableInputSpec {
  path: string;
  options?: CsvOptions;
}

export interface CsvOptions {
  delimiter?: string;
  quote?: string;
}

// ============================================
// Composition Result Types
// ============================================

export type ComposeState =
  | 'init'
  | 'template-resolved'
  | 'section-rendered'
  | 'overflow-expanded'
  | 'headers-footers-applied'
  | 'completed'
  | 'failed';

export interface SectionTrace {
  sectionId: string;
  status: 'rendered' | 'skipped';
  pages: number;
  addendumPages: number;
}

export interface ComposeResult {
  templateId: string;
  bytes: Uint8Array;
  pageCount: number;
  sections: SectionTrace[];
  trace: ComposeState[];
}

// ============================================
// Error Types
// ============================================

export class ComposerError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
    public readonly reason?: string
  ) {
    super(message);
    this.name = 'ComposerError';
  }
}

export class TemplateNotFoundError extends ComposerError {
  constructor(public readonly templateId: string, path?: string, reason?: string) {
    super(`Template not found: ${templateId}`, path ?? templateId, reason ?? 'NOT_FOUND');
    this.name = 'TemplateNotFoundError';
  }
}

export class TemplateParseError extends ComposerError {
  constructor(message: string, path?: string, reason?: string) {
    super(message, path, reason);
    this.name = 'TemplateParseError';
  }
}

export class CyclicInheritanceError extends ComposerError {
  constructor(public readonly chain: readonly string[], reason?: string) {
    super(
      `Cyclic or too deep template inheritance: ${chain.join(' -> ')}`,
      chain[0],
      reason ?? 'CYCLE'
    );
    this.name = 'CyclicInheritanceError';
  }
}

export class UnresolvedPlaceholderError extends ComposerError {
  constructor(public readonly placeholder: string, source: string) {
    super(`Unresolved placeholder \${${placeholder}} in "${source}"`, source, 'UNRESOLVED_PLACEHOLDER');
    this.name = 'UnresolvedPlaceholderError';
  }
}

export class InvalidOverflowConfigError extends ComposerError {
  constructor(message: string, path?: string, reason?: string) {
    super(message, path, reason);
    this.name = 'InvalidOverflowConfigError';
  }
}

export class UnsupportedRenderTypeError extends ComposerError {
  constructor(public readonly renderType: string, available: readonly string[]) {
    super(`Unsupported render type: ${renderType}`, 'headerFooterConfig', `Available: ${available.join(', ')}`);
    this.name = 'UnsupportedRenderTypeError';
  }
}

export class UnsupportedMappingTypeError extends ComposerError {
  constructor(public readonly mappingType: string, available: readonly string[]) {
    super(`Unsupported mapping type: ${mappingType}`, 'mappingType', `Available: ${available.join(', ')}`);
    this.name = 'UnsupportedMappingTypeError';
  }
}

export class FieldMappingError extends ComposerError {
  constructor(
    public readonly field: string,
    public readonly expression: string,
    public readonly mappingType: string,
    cause: unknown
  ) {
    super(
      `Failed to map field "${field}" with ${mappingType} expression "${expression}"`,
      field,
      cause instanceof Error ? cause.message : String(cause)
    );
    this.name = 'FieldMappingError';
  }
}

export class SectionRenderError extends ComposerError {
  constructor(
    public readonly templateId: string,
    public readonly sectionId: string,
    public readonly cause: unknown
  ) {
    super(
      `Failed to render section "${sectionId}" of template "${templateId}"`,
      `${templateId}#${sectionId}`,
      cause instanceof Error ? cause.message : String(cause)
    );
    this.name = 'SectionRenderError';
  }
}

export class JobBundleError extends ComposerError {
  constructor(message: string, path?: string, reason?: string) {
    super(message, path, reason);
    this.name = 'JobBundleError';
  }
}
