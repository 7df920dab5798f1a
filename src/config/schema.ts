/**
 * Editor configuration schemas.
 *
 * `EditorConfigSchema` is the resolved shape with every field present;
 * `EditorConfigInputSchema` is what callers pass in, every field optional.
 */

import { Type } from "@sinclair/typebox";
import type { Static } from "@sinclair/typebox";
import { StrictObject } from "./typebox-helpers.ts";

const Width = Type.Number({ minimum: 0, description: "Viewport width in pixels" });
const Height = Type.Number({ minimum: 0, description: "Viewport height in pixels" });
const CharWidth = Type.Number({ exclusiveMinimum: 0, description: "Character cell width in pixels" });
const LineHeight = Type.Number({ exclusiveMinimum: 0, description: "Line height in pixels" });

const TabWidth = Type.Integer({ minimum: 1, maximum: 32 });
const MaxUndoLevels = Type.Integer({ minimum: 1 });
const PageSize = Type.Integer({ minimum: 1, description: "Lines moved by page up/down" });
const WordBoundaryCharacters = Type.String({
  description: "Punctuation treated as word boundaries, in addition to whitespace",
});

export const ViewportConfigSchema = StrictObject(
  { width: Width, height: Height, charWidth: CharWidth, lineHeight: LineHeight },
  { $id: "ViewportConfig" },
);

export type ViewportConfig = Static<typeof ViewportConfigSchema>;

export const EditorConfigSchema = StrictObject(
  {
    tabWidth: TabWidth,
    maxUndoLevels: MaxUndoLevels,
    pageSize: PageSize,
    wordBoundaryCharacters: WordBoundaryCharacters,
    viewport: ViewportConfigSchema,
    debug: Type.Boolean(),
  },
  { $id: "EditorConfig" },
);

export type EditorConfig = Static<typeof EditorConfigSchema>;

export const EditorConfigInputSchema = StrictObject({
  tabWidth: Type.Optional(TabWidth),
  maxUndoLevels: Type.Optional(MaxUndoLevels),
  pageSize: Type.Optional(PageSize),
  wordBoundaryCharacters: Type.Optional(WordBoundaryCharacters),
  viewport: Type.Optional(
    StrictObject({
      width: Type.Optional(Width),
      height: Type.Optional(Height),
      charWidth: Type.Optional(CharWidth),
      lineHeight: Type.Optional(LineHeight),
    }),
  ),
  debug: Type.Optional(Type.Boolean()),
});

export type EditorConfigInput = Static<typeof EditorConfigInputSchema>;
