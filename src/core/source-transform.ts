// src/core/source-transform.ts

import ts from 'typescript';
import {
    DEFAULT_HELPER_NAME,
    type DeclaredParam,
    type Delimiters,
    type GeneratedFunction,
    type SchemaDeclaration,
    type UnusedSchemaPolicy,
} from '../schema';
import {findAnnotationTags, parseAnnotationArgs} from '../ast/annotation';
import {createSchemaRegistry} from './schema-resolver';
import {generate} from './generate';
import {
    GenerationError,
    isGenerationError,
    type Diagnostic,
} from './errors';

export interface TransformOptions {
    /** Used for error locations and to pick the script kind. */
    fileName: string;
    /** JSDoc tag name without "@". Default: "endpoint". */
    tag?: string;
    /** Default helper name. Default: "endpoint". */
    helperName?: string;
    delimiters?: Delimiters;
    unusedSchema?: UnusedSchemaPolicy;
    /** Default: 4. */
    indentStep?: number;
}

export interface GeneratedHelperInfo {
    /** Name of the annotated function ("default" for anonymous default exports). */
    functionName: string;
    /** 1-based line of the annotation tag. */
    line: number;
    helper: GeneratedFunction;
}

export interface FileTransformResult {
    fileName: string;
    /** Transformed text; the unchanged input when there are errors. */
    output: string;
    helpers: GeneratedHelperInfo[];
    diagnostics: Diagnostic[];
    errors: GenerationError[];
}

type FunctionLike =
    | ts.FunctionDeclaration
    | ts.MethodDeclaration
    | ts.ArrowFunction
    | ts.FunctionExpression;

interface AnnotatedTarget {
    /** Node carrying the JSDoc comment. */
    host: ts.Node;
    fn: FunctionLike | undefined;
    functionName: string;
    args: string;
    line: number;
    /** Set when the annotation itself is unusable. */
    error?: GenerationError;
}

interface TextEdit {
    start: number;
    end: number;
    text: string;
}

/**
 * Insert a generated path helper at the top of every annotated function
 * body in a TypeScript source file.
 *
 * Parameter types are looked up among the interfaces, object type aliases
 * and classes declared in the same file. If any annotation fails, the file
 * is left untouched and every failure is reported.
 */
export function transformSource(
    text: string,
    opts: TransformOptions,
): FileTransformResult {
    const tag = opts.tag ?? 'endpoint';
    const defaultHelperName = opts.helperName ?? DEFAULT_HELPER_NAME;
    const indentUnit = ' '.repeat(opts.indentStep ?? 4);
    const eol = text.includes('\r\n') ? '\r\n' : '\n';

    const sf = ts.createSourceFile(
        opts.fileName,
        text,
        ts.ScriptTarget.Latest,
        true,
        scriptKindFor(opts.fileName),
    );

    const registry = createSchemaRegistry(collectSchemaDeclarations(sf));
    const targets = findAnnotatedTargets(sf, tag);

    const helpers: GeneratedHelperInfo[] = [];
    const diagnostics: Diagnostic[] = [];
    const errors: GenerationError[] = [];
    const edits: TextEdit[] = [];

    for (const target of targets) {
        try {
            if (target.error) throw target.error;

            const annotation = parseAnnotationArgs(target.args);
            const body = bodyOf(target);
            const helperName = annotation.name ?? defaultHelperName;

            if (declaresName(body, helperName)) {
                throw new GenerationError(
                    'HelperConflict',
                    `"${target.functionName}" already declares "${helperName}" in its body.`,
                );
            }

            const result = generate(
                annotation.template,
                annotation.params,
                declaredParams(target.fn, sf),
                {
                    registry,
                    delimiters: opts.delimiters,
                    unusedSchema: opts.unusedSchema,
                    helperName,
                    indentStep: opts.indentStep,
                },
            );

            diagnostics.push(
                ...result.diagnostics.map((d) => ({...d, line: target.line})),
            );
            edits.push(
                insertionEdit(text, sf, target.host, body, result.code, indentUnit, eol),
            );
            helpers.push({
                functionName: target.functionName,
                line: target.line,
                helper: result.helper,
            });
        } catch (err) {
            if (!isGenerationError(err)) throw err;
            errors.push(err.at(opts.fileName, target.line));
        }
    }

    if (errors.length) {
        return {fileName: opts.fileName, output: text, helpers: [], diagnostics, errors};
    }

    return {
        fileName: opts.fileName,
        output: applyEdits(text, edits),
        helpers,
        diagnostics,
        errors,
    };
}

// ---------------------------------------------------------------------------
// Internal: schema collection
// ---------------------------------------------------------------------------

/**
 * Interfaces, object type aliases and classes declared anywhere in the file.
 */
export function collectSchemaDeclarations(sf: ts.SourceFile): SchemaDeclaration[] {
    const out: SchemaDeclaration[] = [];

    const visit = (node: ts.Node) => {
        if (ts.isInterfaceDeclaration(node)) {
            out.push({
                name: node.name.text,
                fields: typeMemberFields(node.members, sf),
                extends: heritageNames(node.heritageClauses, sf),
            });
        } else if (ts.isTypeAliasDeclaration(node) && ts.isTypeLiteralNode(node.type)) {
            out.push({
                name: node.name.text,
                fields: typeMemberFields(node.type.members, sf),
            });
        } else if (ts.isClassDeclaration(node) && node.name) {
            out.push({
                name: node.name.text,
                fields: classFields(node, sf),
                extends: heritageNames(node.heritageClauses, sf),
            });
        }
        ts.forEachChild(node, visit);
    };

    ts.forEachChild(sf, visit);
    return out;
}

function propertyNameText(name: ts.PropertyName): string | undefined {
    if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
        return name.text;
    }
    return undefined;
}

function typeMemberFields(
    members: ts.NodeArray<ts.TypeElement>,
    sf: ts.SourceFile,
): Array<{name: string; type: string}> {
    const fields: Array<{name: string; type: string}> = [];
    for (const member of members) {
        if (!ts.isPropertySignature(member)) continue;
        const name = propertyNameText(member.name);
        if (name === undefined) continue;
        fields.push({name, type: member.type ? member.type.getText(sf) : 'unknown'});
    }
    return fields;
}

function hasModifier(node: ts.HasModifiers, kind: ts.SyntaxKind): boolean {
    return ts.getModifiers(node)?.some((m) => m.kind === kind) ?? false;
}

function classFields(
    node: ts.ClassDeclaration,
    sf: ts.SourceFile,
): Array<{name: string; type: string}> {
    const fields: Array<{name: string; type: string}> = [];
    for (const member of node.members) {
        if (ts.isPropertyDeclaration(member)) {
            if (hasModifier(member, ts.SyntaxKind.StaticKeyword)) continue;
            const name = propertyNameText(member.name);
            if (name === undefined) continue;
            fields.push({name, type: member.type ? member.type.getText(sf) : 'unknown'});
        } else if (ts.isConstructorDeclaration(member)) {
            // Parameter properties: constructor(public id: number)
            for (const param of member.parameters) {
                if (!ts.isIdentifier(param.name)) continue;
                if (!ts.getModifiers(param)?.length) continue;
                fields.push({
                    name: param.name.text,
                    type: param.type ? param.type.getText(sf) : 'unknown',
                });
            }
        }
    }
    return fields;
}

function heritageNames(
    clauses: ts.NodeArray<ts.HeritageClause> | undefined,
    sf: ts.SourceFile,
): string[] {
    const names: string[] = [];
    for (const clause of clauses ?? []) {
        if (clause.token !== ts.SyntaxKind.ExtendsKeyword) continue;
        for (const type of clause.types) {
            names.push(type.expression.getText(sf));
        }
    }
    return names;
}

// ---------------------------------------------------------------------------
// Internal: annotated functions
// ---------------------------------------------------------------------------

/**
 * Every node carrying a JSDoc block with the tag. A comment is claimed by the
 * outermost node it leads, so a tag is reported once. Tags on anything other
 * than a function candidate become targets without a function, which fail
 * later with SignatureMismatch.
 */
function findAnnotatedTargets(sf: ts.SourceFile, tag: string): AnnotatedTarget[] {
    const text = sf.getFullText();
    const targets: AnnotatedTarget[] = [];
    const claimed = new Set<number>();

    const visit = (node: ts.Node) => {
        const found = annotationTagsOf(node, text, sf, tag, claimed);
        if (found.length) {
            const candidate = functionCandidate(node, sf) ?? {
                fn: undefined,
                name: nodeName(node, sf),
            };
            const [first] = found;
            targets.push({
                host: node,
                fn: candidate.fn,
                functionName: candidate.name,
                args: first.args,
                line: found.length > 1 ? found[1].line : first.line,
                error:
                    found.length > 1
                        ? new GenerationError(
                              'InvalidAnnotation',
                              `"${candidate.name}" has ${found.length} @${tag} tags; only one is allowed.`,
                          )
                        : undefined,
            });
        }
        ts.forEachChild(node, visit);
    };

    ts.forEachChild(sf, visit);
    return targets;
}

function functionOf(init: ts.Expression | undefined): FunctionLike | undefined {
    return init && (ts.isArrowFunction(init) || ts.isFunctionExpression(init))
        ? init
        : undefined;
}

function functionCandidate(
    node: ts.Node,
    sf: ts.SourceFile,
): {fn: FunctionLike | undefined; name: string} | undefined {
    if (ts.isFunctionDeclaration(node)) {
        return {fn: node, name: node.name?.text ?? 'default'};
    }
    if (ts.isMethodDeclaration(node)) {
        return {fn: node, name: node.name.getText(sf)};
    }
    if (ts.isPropertyDeclaration(node)) {
        // get = (params: P) => { ... }
        return {fn: functionOf(node.initializer), name: node.name.getText(sf)};
    }
    if (ts.isVariableStatement(node)) {
        const [decl] = node.declarationList.declarations;
        return {
            fn: functionOf(decl?.initializer),
            name: decl ? decl.name.getText(sf) : 'unknown',
        };
    }
    return undefined;
}

function nodeName(node: ts.Node, sf: ts.SourceFile): string {
    if (
        ts.isPropertySignature(node) ||
        ts.isMethodSignature(node) ||
        ts.isPropertyAssignment(node) ||
        ts.isGetAccessorDeclaration(node) ||
        ts.isSetAccessorDeclaration(node) ||
        ts.isEnumMember(node)
    ) {
        return node.name.getText(sf);
    }
    if (
        ts.isClassDeclaration(node) ||
        ts.isInterfaceDeclaration(node) ||
        ts.isTypeAliasDeclaration(node) ||
        ts.isEnumDeclaration(node)
    ) {
        return node.name?.getText(sf) ?? 'default';
    }
    const firstLine = node.getText(sf).split(/\r?\n/)[0].trim();
    return firstLine || 'end of file';
}

function annotationTagsOf(
    node: ts.Node,
    text: string,
    sf: ts.SourceFile,
    tag: string,
    claimed: Set<number>,
): Array<{args: string; line: number}> {
    const found: Array<{args: string; line: number}> = [];
    for (const range of ts.getLeadingCommentRanges(text, node.pos) ?? []) {
        if (range.kind !== ts.SyntaxKind.MultiLineCommentTrivia) continue;
        if (claimed.has(range.pos)) continue;
        const comment = text.slice(range.pos, range.end);
        if (!comment.startsWith('/**')) continue;
        claimed.add(range.pos);

        const commentLine = sf.getLineAndCharacterOfPosition(range.pos).line;
        for (const t of findAnnotationTags(comment, tag)) {
            found.push({args: t.args, line: commentLine + t.lineOffset + 1});
        }
    }
    return found;
}

function bodyOf(target: AnnotatedTarget): ts.Block {
    const {fn} = target;
    if (!fn) {
        throw new GenerationError(
            'SignatureMismatch',
            `"${target.functionName}" is not a function; the annotation applies to functions, methods and function-valued properties only.`,
        );
    }
    if (!fn.body) {
        throw new GenerationError(
            'SignatureMismatch',
            `"${target.functionName}" has no body to insert the helper into.`,
        );
    }
    if (!ts.isBlock(fn.body)) {
        throw new GenerationError(
            'SignatureMismatch',
            `"${target.functionName}" has an expression body; use a block body.`,
        );
    }
    return fn.body;
}

function declaredParams(fn: FunctionLike | undefined, sf: ts.SourceFile): DeclaredParam[] {
    if (!fn) return [];
    return fn.parameters
        .filter((p) => !(ts.isIdentifier(p.name) && p.name.text === 'this'))
        .map((p) => ({
            name: p.name.getText(sf),
            type: p.type ? p.type.getText(sf) : undefined,
        }));
}

function declaresName(body: ts.Block, name: string): boolean {
    return body.statements.some((statement) => {
        if (ts.isFunctionDeclaration(statement)) {
            return statement.name?.text === name;
        }
        if (ts.isVariableStatement(statement)) {
            return statement.declarationList.declarations.some(
                (d) => ts.isIdentifier(d.name) && d.name.text === name,
            );
        }
        return false;
    });
}

// ---------------------------------------------------------------------------
// Internal: text edits
// ---------------------------------------------------------------------------

function lineIndent(text: string, sf: ts.SourceFile, pos: number): string {
    const {line} = sf.getLineAndCharacterOfPosition(pos);
    const lineStart = sf.getPositionOfLineAndCharacter(line, 0);
    const m = /^[ \t]*/.exec(text.slice(lineStart));
    return m ? m[0] : '';
}

/**
 * Edit placing the helper right after the body's "{", one level deeper
 * than the line the annotated declaration starts on.
 */
function insertionEdit(
    text: string,
    sf: ts.SourceFile,
    host: ts.Node,
    body: ts.Block,
    code: string,
    indentUnit: string,
    eol: string,
): TextEdit {
    const baseIndent = lineIndent(text, sf, host.getStart(sf));
    const bodyIndent = baseIndent + indentUnit;
    const start = body.getStart(sf) + 1;

    let insert = code
        .split('\n')
        .map((line) => eol + bodyIndent + line)
        .join('');

    const rest = text.slice(start);
    const spaces = /^[ \t]*/.exec(rest);
    const gap = spaces ? spaces[0].length : 0;

    if (rest[gap] === '}') {
        // "{}" on one line
        insert += eol + baseIndent;
        return {start, end: start + gap, text: insert};
    }
    if (rest[gap] !== '\n' && rest[gap] !== '\r') {
        // statements continue on the same line as "{"
        insert += eol + bodyIndent;
        return {start, end: start + gap, text: insert};
    }
    return {start, end: start, text: insert};
}

function applyEdits(text: string, edits: TextEdit[]): string {
    let out = text;
    for (const edit of [...edits].sort((a, b) => b.start - a.start)) {
        out = out.slice(0, edit.start) + edit.text + out.slice(edit.end);
    }
    return out;
}

function scriptKindFor(fileName: string): ts.ScriptKind {
    const lower = fileName.toLowerCase();
    if (lower.endsWith('.tsx')) return ts.ScriptKind.TSX;
    if (lower.endsWith('.jsx')) return ts.ScriptKind.JSX;
    if (lower.endsWith('.js') || lower.endsWith('.mjs') || lower.endsWith('.cjs')) {
        return ts.ScriptKind.JS;
    }
    return ts.ScriptKind.TS;
}
