/**
 * Keymap schema: the serializable form of key bindings, as stored in
 * default-keymap.json or supplied by a host.
 */

import { Type } from "@sinclair/typebox";
import type { Static } from "@sinclair/typebox";
import { StrictObject } from "../config/typebox-helpers.ts";

const DirectionSchema = Type.Union([
  Type.Literal("left"),
  Type.Literal("right"),
  Type.Literal("up"),
  Type.Literal("down"),
]);

const GranularitySchema = Type.Union([
  Type.Literal("character"),
  Type.Literal("word"),
  Type.Literal("line"),
  Type.Literal("page"),
  Type.Literal("buffer"),
]);

const noArg = <T extends string>(type: T) => StrictObject({ type: Type.Literal(type) });

/** Commands a key can be bound to. A subset of EditorCommand. */
export const BindableCommandSchema = Type.Union([
  noArg("deleteChar"),
  noArg("deleteCharBackward"),
  noArg("deleteWordForward"),
  noArg("deleteWordBackward"),
  noArg("deleteToLineEnd"),
  noArg("deleteToLineStart"),
  noArg("deleteLine"),
  noArg("deleteSelection"),
  noArg("startSelection"),
  noArg("endSelection"),
  noArg("selectAll"),
  noArg("selectLine"),
  noArg("selectWord"),
  noArg("clearSelection"),
  noArg("undo"),
  noArg("redo"),
  noArg("cut"),
  noArg("copy"),
  noArg("paste"),
  noArg("findNext"),
  noArg("findPrevious"),
  StrictObject({
    type: Type.Literal("moveCursor"),
    direction: DirectionSchema,
    granularity: GranularitySchema,
  }),
  StrictObject({
    type: Type.Literal("moveCursorWithSelection"),
    direction: DirectionSchema,
    granularity: GranularitySchema,
  }),
  StrictObject({ type: Type.Literal("insertText"), text: Type.String() }),
  StrictObject({ type: Type.Literal("find"), pattern: Type.String() }),
  StrictObject({
    type: Type.Literal("command"),
    name: Type.String(),
    args: Type.Array(Type.String()),
  }),
]);

export type BindableCommand = Static<typeof BindableCommandSchema>;

export const KeymapEntrySchema = StrictObject({
  shortcut: Type.String({ minLength: 1 }),
  command: BindableCommandSchema,
  description: Type.Optional(Type.String()),
});

export type KeymapEntry = Static<typeof KeymapEntrySchema>;

export const KeymapSchema = Type.Array(KeymapEntrySchema);

/** Layout of default-keymap.json: bindings for every platform plus macOS extras. */
export const DefaultKeymapSchema = StrictObject({
  common: KeymapSchema,
  mac: KeymapSchema,
});
