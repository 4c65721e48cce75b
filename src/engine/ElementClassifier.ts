import * as path from "path";
import type { ClassificationConfig } from "../config/AnalyzerConfig.js";
import { ClassificationConfigSchema } from "../config/AnalyzerConfig.js";
import { simpleTypeName } from "../ast/SyntaxText.js";
import type { ClassificationContext, ElementKind, TypeDeclaration } from "../types.js";

/**
 * Assigns one semantic role to each declaration. Rules are tried in a fixed order and the
 * first match wins:
 *
 * 1. `interface` → Interface
 * 2. `enum` → Enum
 * 3. DTO suffix and no method with a non-trivial body → DTO
 * 4. service suffix, or a services namespace (directory when there is no namespace) → Service
 * 5. controller suffix, or a controller base type → Controller
 * 6. `record` → Record, `struct` → Struct, anything else → GenericClass
 */
export class ElementClassifier {
    private readonly serviceNamespacePatterns: RegExp[];
    private readonly controllerBasePatterns: RegExp[];

    constructor(private readonly config: ClassificationConfig = ClassificationConfigSchema.parse({})) {
        this.serviceNamespacePatterns = config.serviceNamespacePatterns.map(pattern => new RegExp(pattern, "i"));
        this.controllerBasePatterns = config.controllerBasePatterns.map(pattern => new RegExp(pattern, "i"));
    }

    classify(decl: TypeDeclaration, context: ClassificationContext): ElementKind {
        if (decl.kind === "interface") return "Interface";
        if (decl.kind === "enum") return "Enum";

        if (this.hasSuffix(decl.name, this.config.dtoSuffixes) && !this.hasLogic(decl)) {
            return "DTO";
        }
        if (this.hasSuffix(decl.name, this.config.serviceSuffixes) || this.inServicesArea(context)) {
            return "Service";
        }
        if (this.hasSuffix(decl.name, this.config.controllerSuffixes) || this.extendsController(decl)) {
            return "Controller";
        }

        switch (decl.kind) {
            case "record":
                return "Record";
            case "struct":
                return "Struct";
            default:
                return "GenericClass";
        }
    }

    private hasSuffix(name: string, suffixes: readonly string[]): boolean {
        const lower = name.toLowerCase();
        return suffixes.some(suffix => lower.endsWith(suffix.toLowerCase()));
    }

    /** A method with more than one statement or any branch counts as logic. */
    private hasLogic(decl: TypeDeclaration): boolean {
        return decl.members.some(member =>
            member.kind === "method" && member.body !== undefined
            && (member.body.statements > 1 || member.body.branches > 0)
        );
    }

    private inServicesArea(context: ClassificationContext): boolean {
        const segments = context.namespace
            ? context.namespace.split(".")
            : path.posix.dirname(context.fileName.replace(/\\/g, "/")).split("/");
        return segments.some(segment =>
            segment.length > 0 && this.serviceNamespacePatterns.some(pattern => pattern.test(segment))
        );
    }

    private extendsController(decl: TypeDeclaration): boolean {
        return decl.baseTypes.some(base => {
            const name = simpleTypeName(base);
            return this.controllerBasePatterns.some(pattern => pattern.test(name));
        });
    }
}
