export { openCursor } from "./core/cursor.js"
export type { Cursor } from "./core/cursor.js"
export { array, boolean, lazy, makeDecoder, optional, record, string } from "./core/decoder.js"
export type { Decoder } from "./core/decoder.js"
export { deriveDecoders } from "./core/derive.js"
export type { DeriveError, DeriveOptions } from "./core/derive.js"
export { isJsonArray, isJsonObject } from "./core/json.js"
export type { Json, JsonObject } from "./core/json.js"
export { f32, f64, i128, i16, i32, i64, i8, u128, u16, u32, u64, u8 } from "./core/numbers.js"
export type { F32, F64, I128, I16, I32, I64, I8, U128, U16, U32, U64, U8 } from "./core/numbers.js"
export { parse, parseJson } from "./core/parse.js"
export { describeParserErrKind, formatParserErr, ParserBug, parserErrToJson } from "./core/parser-error.js"
export type { ParserErr, ParserErrKind } from "./core/parser-error.js"
export { render } from "./core/render.js"
export type { RenderOptions } from "./core/render.js"
export { makeScanner } from "./core/scanner.js"
export type { Scanner } from "./core/scanner.js"
export { struct } from "./core/struct.js"
export type { StructFields } from "./core/struct.js"
export type { Token, TokenKind } from "./core/token.js"
export { value } from "./core/value.js"
