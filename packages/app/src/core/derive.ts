import * as Either from "effect/Either"
import * as ts from "typescript"

// CHANGE: derive struct decoders from TypeScript record declarations
// WHY: emit per-type decoding logic at build time instead of writing field lists by hand
// QUOTE(TZ): "compile-time derivation that, given a named field schema, emits the parsing logic"
// REF: req-derive-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d ∈ decls(src): emitted(d) = struct(fields(d)) in declaration order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: output is deterministic for a fixed source; forward references go through lazy
// COMPLEXITY: O(n) where n = AST size

export type DeriveError = { readonly _tag: "DeriveError"; readonly message: string }

export const deriveError = (message: string): DeriveError => ({ _tag: "DeriveError", message })

export interface DeriveOptions {
  /** Module the declarations are imported from; defaults to the source file beside the output. */
  readonly typesModule?: string
  /** Module exporting the decoders. */
  readonly libraryModule?: string
}

interface RecordField {
  readonly name: string
  readonly type: ts.TypeNode
}

interface RecordDeclaration {
  readonly name: string
  readonly fields: ReadonlyArray<RecordField>
}

interface EmitContext {
  readonly sourceFile: ts.SourceFile
  readonly declared: ReadonlyMap<string, number>
  readonly position: number
  readonly imports: Set<string>
}

const DEFAULT_LIBRARY = "tyjson"

const NUMERIC_ALIASES: ReadonlyMap<string, string> = new Map([
  ["I8", "i8"],
  ["I16", "i16"],
  ["I32", "i32"],
  ["I64", "i64"],
  ["I128", "i128"],
  ["U8", "u8"],
  ["U16", "u16"],
  ["U32", "u32"],
  ["U64", "u64"],
  ["U128", "u128"],
  ["F32", "f32"],
  ["F64", "f64"]
])

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/

const defaultTypesModule = (fileName: string): string => {
  const base = fileName.split(/[\\/]/).pop() ?? fileName
  return `./${base.replace(/(\.d)?\.[cm]?tsx?$/, "")}.js`
}

const parseSourceFile = (
  source: string,
  fileName: string
): Either.Either<ts.SourceFile, DeriveError> => {
  const diagnostics = ts.transpileModule(source, {
    compilerOptions: { module: ts.ModuleKind.ESNext },
    fileName,
    reportDiagnostics: true
  }).diagnostics ?? []
  const errors = diagnostics.filter(
    (diag: ts.Diagnostic) => diag.category === ts.DiagnosticCategory.Error
  )
  if (errors.length > 0) {
    const message = errors
      .map((diag: ts.Diagnostic) => ts.flattenDiagnosticMessageText(diag.messageText, "\n"))
      .join("; ")
    return Either.left(deriveError(`${fileName}: ${message}`))
  }
  return Either.right(ts.createSourceFile(fileName, source, ts.ScriptTarget.ESNext, true, ts.ScriptKind.TS))
}

const propertyName = (name: ts.PropertyName): string | undefined => {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name)) {
    return name.text
  }
  return undefined
}

const readMembers = (
  declaration: string,
  members: ts.NodeArray<ts.TypeElement>,
  sourceFile: ts.SourceFile
): Either.Either<ReadonlyArray<RecordField>, DeriveError> => {
  const fields: Array<RecordField> = []
  for (const member of members) {
    if (!ts.isPropertySignature(member)) {
      return Either.left(
        deriveError(`${declaration}: only property members are supported (${member.getText(sourceFile)})`)
      )
    }
    const name = propertyName(member.name)
    if (name === undefined) {
      return Either.left(deriveError(`${declaration}: computed property names are not supported`))
    }
    if (member.questionToken !== undefined) {
      return Either.left(deriveError(`${declaration}.${name}: optional fields must be declared as Option<T>`))
    }
    if (member.type === undefined) {
      return Either.left(deriveError(`${declaration}.${name}: missing type annotation`))
    }
    fields.push({ name, type: member.type })
  }
  return Either.right(fields)
}

const readDeclaration = (
  statement: ts.Statement,
  sourceFile: ts.SourceFile
): Either.Either<RecordDeclaration | undefined, DeriveError> => {
  if (ts.isInterfaceDeclaration(statement)) {
    const name = statement.name.text
    if (statement.typeParameters !== undefined || statement.heritageClauses !== undefined) {
      return Either.left(deriveError(`${name}: generic or extending interfaces are not supported`))
    }
    return Either.map(readMembers(name, statement.members, sourceFile), (fields) => ({ name, fields }))
  }
  if (ts.isTypeAliasDeclaration(statement) && ts.isTypeLiteralNode(statement.type)) {
    const name = statement.name.text
    if (statement.typeParameters !== undefined) {
      return Either.left(deriveError(`${name}: generic type aliases are not supported`))
    }
    return Either.map(readMembers(name, statement.type.members, sourceFile), (fields) => ({ name, fields }))
  }
  const skipped: RecordDeclaration | undefined = undefined
  return Either.right(skipped)
}

const collectDeclarations = (
  sourceFile: ts.SourceFile
): Either.Either<ReadonlyArray<RecordDeclaration>, DeriveError> => {
  const declarations: Array<RecordDeclaration> = []
  for (const statement of sourceFile.statements) {
    const read = readDeclaration(statement, sourceFile)
    if (Either.isLeft(read)) {
      return Either.left(read.left)
    }
    if (read.right !== undefined) {
      declarations.push(read.right)
    }
  }
  return Either.right(declarations)
}

const referenceName = (node: ts.TypeReferenceNode): string =>
  ts.isIdentifier(node.typeName)
    ? node.typeName.text
    : `${node.typeName.left.getText()}.${node.typeName.right.text}`

const use = (context: EmitContext, decoder: string): string => {
  context.imports.add(decoder)
  return decoder
}

const wrap = (
  context: EmitContext,
  combinator: string,
  inner: Either.Either<string, DeriveError>
): Either.Either<string, DeriveError> => Either.map(inner, (expression) => `${use(context, combinator)}(${expression})`)

const isStringKey = (node: ts.TypeNode | undefined): boolean =>
  node !== undefined && node.kind === ts.SyntaxKind.StringKeyword

const emitReference = (
  node: ts.TypeReferenceNode,
  context: EmitContext,
  unsupported: () => Either.Either<string, DeriveError>
): Either.Either<string, DeriveError> => {
  const name = referenceName(node)
  const args = node.typeArguments ?? []
  const [first, second] = args
  if ((name === "Array" || name === "ReadonlyArray") && args.length === 1 && first !== undefined) {
    return wrap(context, "array", emitType(first, context))
  }
  if ((name === "Option" || name === "Option.Option") && args.length === 1 && first !== undefined) {
    return wrap(context, "optional", emitType(first, context))
  }
  if (name === "Record" && args.length === 2 && isStringKey(first) && second !== undefined) {
    return wrap(context, "record", emitType(second, context))
  }
  if (args.length > 0) {
    return unsupported()
  }
  if (name === "Json") {
    return Either.right(use(context, "value"))
  }
  const numeric = NUMERIC_ALIASES.get(name)
  if (numeric !== undefined) {
    return Either.right(use(context, numeric))
  }
  const index = context.declared.get(name)
  if (index === undefined) {
    return unsupported()
  }
  return Either.right(
    index < context.position ? `${name}Decoder` : `${use(context, "lazy")}(() => ${name}Decoder)`
  )
}

const emitIndexSignature = (
  node: ts.TypeLiteralNode,
  context: EmitContext,
  unsupported: () => Either.Either<string, DeriveError>
): Either.Either<string, DeriveError> => {
  const [member] = node.members
  if (node.members.length !== 1 || member === undefined || !ts.isIndexSignatureDeclaration(member)) {
    return unsupported()
  }
  const [parameter] = member.parameters
  if (member.parameters.length !== 1 || !isStringKey(parameter?.type)) {
    return unsupported()
  }
  return wrap(context, "record", emitType(member.type, context))
}

const emitType = (node: ts.TypeNode, context: EmitContext): Either.Either<string, DeriveError> => {
  const unsupported = () =>
    Either.left(deriveError(`unsupported field type ${node.getText(context.sourceFile)}`))
  switch (node.kind) {
    case ts.SyntaxKind.StringKeyword:
      return Either.right(use(context, "string"))
    case ts.SyntaxKind.BooleanKeyword:
      return Either.right(use(context, "boolean"))
    case ts.SyntaxKind.NumberKeyword:
      return Either.right(use(context, "f64"))
    case ts.SyntaxKind.BigIntKeyword:
      return Either.right(use(context, "i64"))
    case ts.SyntaxKind.UnknownKeyword:
      return Either.right(use(context, "value"))
    default:
      break
  }
  if (ts.isParenthesizedTypeNode(node)) {
    return emitType(node.type, context)
  }
  if (ts.isArrayTypeNode(node)) {
    return wrap(context, "array", emitType(node.elementType, context))
  }
  if (ts.isTypeOperatorNode(node) && node.operator === ts.SyntaxKind.ReadonlyKeyword) {
    return ts.isArrayTypeNode(node.type) ? emitType(node.type, context) : unsupported()
  }
  if (ts.isTypeReferenceNode(node)) {
    return emitReference(node, context, unsupported)
  }
  if (ts.isTypeLiteralNode(node)) {
    return emitIndexSignature(node, context, unsupported)
  }
  return unsupported()
}

const fieldKey = (name: string): string => IDENTIFIER.test(name) ? name : JSON.stringify(name)

const emitDeclaration = (
  declaration: RecordDeclaration,
  context: EmitContext
): Either.Either<string, DeriveError> => {
  const lines: Array<string> = []
  for (const field of declaration.fields) {
    const expression = emitType(field.type, context)
    if (Either.isLeft(expression)) {
      return Either.left(deriveError(`${declaration.name}.${field.name}: ${expression.left.message}`))
    }
    lines.push(`  ${fieldKey(field.name)}: ${expression.right}`)
  }
  const body = lines.length === 0 ? "{}" : `{\n${lines.join(",\n")}\n}`
  return Either.right(
    `export const ${declaration.name}Decoder: Decoder<${declaration.name}> = ${use(context, "struct")}(${body})`
  )
}

const renderModule = (
  declarations: ReadonlyArray<RecordDeclaration>,
  bodies: ReadonlyArray<string>,
  imports: ReadonlySet<string>,
  typesModule: string,
  libraryModule: string
): string => {
  const decoders = [...imports].sort()
  const types = declarations.map((declaration) => declaration.name).sort()
  return [
    `import type { Decoder } from ${JSON.stringify(libraryModule)}`,
    `import { ${decoders.join(", ")} } from ${JSON.stringify(libraryModule)}`,
    "",
    `import type { ${types.join(", ")} } from ${JSON.stringify(typesModule)}`,
    "",
    bodies.join("\n\n"),
    ""
  ].join("\n")
}

/**
 * Emit a module declaring one struct decoder per record declaration.
 *
 * @param source - TypeScript source containing interface or object type declarations.
 * @param fileName - Source file name (diagnostics and the default types module).
 * @returns Either with the module text or a DeriveError naming the offending field.
 *
 * @pure true
 * @invariant decoders are emitted in declaration order as `<Name>Decoder`
 * @complexity O(n)
 */
export const deriveDecoders = (
  source: string,
  fileName: string,
  options: DeriveOptions = {}
): Either.Either<string, DeriveError> => {
  const sourceFileEither = parseSourceFile(source, fileName)
  if (Either.isLeft(sourceFileEither)) {
    return Either.left(sourceFileEither.left)
  }
  const sourceFile = sourceFileEither.right
  const declarationsEither = collectDeclarations(sourceFile)
  if (Either.isLeft(declarationsEither)) {
    return Either.left(declarationsEither.left)
  }
  const declarations = declarationsEither.right
  if (declarations.length === 0) {
    return Either.left(deriveError(`${fileName}: no interface or object type declarations found`))
  }
  const declared = new Map(declarations.map((declaration, index) => [declaration.name, index]))
  const imports = new Set<string>()
  const bodies: Array<string> = []
  for (const [position, declaration] of declarations.entries()) {
    const body = emitDeclaration(declaration, { sourceFile, declared, position, imports })
    if (Either.isLeft(body)) {
      return Either.left(body.left)
    }
    bodies.push(body.right)
  }
  return Either.right(
    renderModule(
      declarations,
      bodies,
      imports,
      options.typesModule ?? defaultTypesModule(fileName),
      options.libraryModule ?? DEFAULT_LIBRARY
    )
  )
}
