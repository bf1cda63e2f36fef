// Merge engine model definitions.
// Purpose: shapes shared by every stage, from parsed source units to the emitted merged unit.
// Assumes cross-stage links are arena indices into flat tables, never object graphs.

// =============================================================================
// INPUT MODEL
// =============================================================================

export type LicenseInfo = {
  id: string;
  text: string;
};

export type DeclarationKind = "function" | "class" | "interface" | "type" | "enum" | "variable";

// A syntax token of a declaration; binding tokens are renamed to placeholders when fingerprinting.
export type DeclarationToken = {
  text: string;
  binding: boolean;
};

export type TextSpan = {
  start: number;
  end: number;
};

// Offsets are relative to Declaration.text.
export type ReferenceSite = TextSpan & {
  name: string;
  shorthand: boolean;
};

// `specifier` is null for names declared in the same unit.
export type DeclarationReference = {
  local: string;
  target: string;
  specifier: string | null;
};

export type Declaration = {
  readonly name: string;
  readonly kind: DeclarationKind;
  readonly text: string;
  readonly start: number;
  readonly exported: boolean;
  readonly defaultExport: boolean;
  readonly nameSite: TextSpan;
  readonly references: readonly DeclarationReference[];
  readonly sites: readonly ReferenceSite[];
  readonly externalUses: readonly string[];
  readonly tokens: readonly DeclarationToken[];
  readonly unitPath: string;
  readonly repositoryId: string;
};

export type ImportBindingKind = "default" | "named" | "namespace" | "side-effect";

export type ImportBinding = {
  kind: ImportBindingKind;
  local: string | null;
  imported: string | null;
  specifier: string;
  relative: boolean;
  typeOnly: boolean;
};

export type SourceUnit = {
  readonly path: string;
  readonly repositoryId: string;
  readonly declarations: readonly Declaration[];
  readonly imports: readonly ImportBinding[];
  readonly skippedStatements: number;
};

export type Repository = {
  readonly id: string;
  readonly rootPath: string;
  readonly trustRank: number;
  readonly license: LicenseInfo;
  readonly revision: string | null;
  readonly units: readonly SourceUnit[];
};

// =============================================================================
// ENGINE TABLES
// =============================================================================

// One row of the flat declaration arena built at the start of a merge.
export type DeclarationEntry = {
  readonly index: number;
  readonly declaration: Declaration;
  readonly repository: Repository;
  readonly unit: SourceUnit;
  readonly fingerprint: string;
  readonly normalized: readonly string[];
};

export type MatchKind = "exact" | "near";

export type DuplicateCluster = {
  fingerprint: string;
  members: number[];
  match: MatchKind;
  confidence: number;
};

export type DuplicateGroup = {
  id: number;
  clusters: DuplicateCluster[];
};

export type DeclarationOrigin = {
  repositoryId: string;
  unitPath: string;
  name: string;
};

export type RejectedNearMatch = DeclarationOrigin & {
  entry: number;
  confidence: number;
};

export type CanonicalDeclaration = {
  index: number;
  entry: number;
  groupId: number;
  subsumed: number[];
  rejected: RejectedNearMatch[];
  exportRoot: boolean;
};

export type DependencyEdge = {
  from: number;
  to: number;
};

// =============================================================================
// OUTPUT MODEL
// =============================================================================

export type AttributionOrigin = {
  repositoryId: string;
  trustRank: number;
  licenseId: string;
  revision: string | null;
  paths: string[];
};

export type MergedDeclaration = {
  id: number;
  name: string;
  originalName: string;
  kind: DeclarationKind;
  text: string;
  exported: boolean;
  origin: DeclarationOrigin;
  attribution: AttributionOrigin[];
  rejected: RejectedNearMatch[];
  dependsOn: number[];
  externalUses: string[];
  annotation: string;
};

export type MergedImport = {
  specifier: string;
  defaultLocal: string | null;
  namespaceLocals: string[];
  named: Array<{ imported: string; local: string; typeOnly: boolean }>;
  sideEffect: boolean;
};

// `export { <target's final name> as name }` for an exported duplicate absorbed under another name.
export type MergedAlias = {
  name: string;
  target: number;
};

// A third-party package imported by surviving declarations, keyed by package name.
export type LibraryUsage = {
  name: string;
  specifiers: string[];
  repositories: string[];
};

export type LicenseNotice = {
  repositoryId: string;
  licenseId: string;
  revision: string | null;
  text: string;
};

export type DeclarationProfile = {
  id: number;
  name: string;
  characters: number;
  lines: number;
  tokens: number;
  inbound: number;
  outbound: number;
};

export type MergedUnit = {
  declarations: MergedDeclaration[];
  imports: MergedImport[];
  aliases: MergedAlias[];
  libraries: LibraryUsage[];
  notices: LicenseNotice[];
  profile: DeclarationProfile[] | null;
};
