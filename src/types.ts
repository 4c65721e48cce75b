export interface LineRange {
    startLine: number;
    endLine: number;
}

export type DeclarationKind = "class" | "interface" | "enum" | "record" | "struct";

export type TypeModifier =
    | "public"
    | "internal"
    | "private"
    | "protected"
    | "static"
    | "abstract"
    | "partial"
    | "sealed";

export const TYPE_MODIFIERS: readonly TypeModifier[] = [
    "public",
    "internal",
    "private",
    "protected",
    "static",
    "abstract",
    "partial",
    "sealed"
];

export type MemberKind = "method" | "constructor" | "property" | "field";

export interface MemberParameter {
    type: string;
    name: string;
}

export interface MemberBody {
    lines: number;
    /** `;` terminators outside parentheses, so `for` headers count once. */
    statements: number;
    /** `if`/`for`/`foreach`/`while`/`switch`/`case`/`catch` keywords plus `&&` and `||`. */
    branches: number;
}

export interface PropertyAccessors {
    get: boolean;
    set: boolean;
    init: boolean;
}

export interface Member {
    name: string;
    kind: MemberKind;
    modifiers: string[];
    signature: string;
    line: number;
    endLine: number;
    returnType?: string;
    parameters?: MemberParameter[];
    isAsync: boolean;
    accessors?: PropertyAccessors;
    body?: MemberBody;
}

export interface TypeDeclaration {
    name: string;
    kind: DeclarationKind;
    modifiers: TypeModifier[];
    members: Member[];
    summary?: string;
    span: LineRange;
    containingFile: string;
    baseTypes: string[];
    typeParameters: string[];
    attributes: string[];
    parent?: string;
    bodyStyle: "block" | "terse";
}

export type Complexity = "Low" | "Medium" | "High";

export interface FileMetrics {
    totalLines: number;
    codeLines: number;
    commentLines: number;
    blankLines: number;
    hasXmlDocs: boolean;
    branchCount: number;
    complexity: Complexity;
}

export type ParseWarningCode = "UnterminatedString" | "UnterminatedComment" | "UnbalancedBraces";

export interface ParseWarning {
    code: ParseWarningCode;
    message: string;
    range: LineRange;
}

export interface StructuralDocument<D extends TypeDeclaration = TypeDeclaration> {
    namespace?: string;
    declarations: D[];
    imports: string[];
    recoveredRanges: LineRange[];
    metrics: FileMetrics;
}

export interface ParseResult {
    document: StructuralDocument;
    warnings: ParseWarning[];
}

export type ElementKind =
    | "DTO"
    | "Service"
    | "Controller"
    | "Interface"
    | "Enum"
    | "Record"
    | "Struct"
    | "GenericClass";

export const ELEMENT_KINDS: readonly ElementKind[] = [
    "DTO",
    "Service",
    "Controller",
    "Interface",
    "Enum",
    "Record",
    "Struct",
    "GenericClass"
];

export interface ClassificationContext {
    fileName: string;
    namespace?: string;
}

export interface ClassifiedDeclaration extends TypeDeclaration {
    elementKind: ElementKind;
    namespace?: string;
}

export type AnalyzedDocument = StructuralDocument<ClassifiedDeclaration>;

export type IndexWarningCode = "ReadFailed" | "PermissionDenied" | "TooLarge" | "ParseWarning";

export interface IndexWarning {
    file: string;
    code: IndexWarningCode;
    message: string;
    range?: LineRange;
}

export interface SolutionStats {
    totalFiles: number;
    totalClasses: number;
    totalInterfaces: number;
    totalEnums: number;
    totalRecords: number;
    totalStructs: number;
    totalMethods: number;
    totalProperties: number;
    totalFields: number;
    totalLines: number;
}

export interface ProjectInfo {
    name: string;
    /** Root-relative path of the project file. */
    projectFile: string;
    /** Root-relative directory, `"."` for a project file at the root. */
    directory: string;
    files: string[];
}

export interface SolutionIndex {
    rootPath: string;
    byNamespace: Map<string, ClassifiedDeclaration[]>;
    byKind: Map<ElementKind, ClassifiedDeclaration[]>;
    byFile: Map<string, AnalyzedDocument>;
    stats: SolutionStats;
    warnings: IndexWarning[];
    projects: ProjectInfo[];
    fingerprint: string;
    builtAt: number;
}

export const GLOBAL_NAMESPACE = "<global>";
