import { Parser } from "htmlparser2";
import { logger } from "./logger";
import type {
  Callout,
  CalloutPurpose,
  CodeBlock,
  Document,
  DocumentLine,
  Heading,
} from "./types";

const CALLOUT_PURPOSES: readonly CalloutPurpose[] = ["info", "note", "tip", "warning"];

const CODE_ELEMENTS = new Set(["pre", "code", "ac:plain-text-body", "script", "style"]);

const INLINE_ELEMENTS = new Set([
  "a",
  "abbr",
  "b",
  "code",
  "em",
  "i",
  "kbd",
  "mark",
  "small",
  "span",
  "strong",
  "sub",
  "sup",
  "u",
  "ac:link",
  "ac:link-body",
  "ac:plain-text-link-body",
  "ri:page",
]);

/** Elements whose end tag HTML lets authors leave out. */
const OPTIONAL_END_ELEMENTS = new Set([
  "p",
  "li",
  "dt",
  "dd",
  "tr",
  "td",
  "th",
  "thead",
  "tbody",
  "tfoot",
  "option",
]);

const MARKUP_PATTERN = /<\/?[A-Za-z][\w:.-]*(?:\s[^<>]*)?\/?>/;
const XML_PATTERN = /<\?xml|<\/?[A-Za-z][\w.-]*:[A-Za-z]/;
const CLOSING_TAG_PATTERN = /<\/[A-Za-z][\w:.-]*\s*>/g;
const TOC_TEXT_PATTERN = /\btable\s+of\s+contents\b|\[toc\]|\[\[_toc_\]\]/i;

export function splitLines(content: string): string[] {
  return content
    .split("\n")
    .map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Build the line-indexed view of a document. Markup is parsed when present;
 * markup that cannot be parsed cleanly is read line by line instead.
 */
export function normalizeDocument(content: string, filePath?: string): Document {
  const rawLines = splitLines(content);

  if (!MARKUP_PATTERN.test(content)) {
    return { ...normalizePlainText(rawLines, false), filePath };
  }

  const structured = parseMarkup(content, rawLines);
  if (structured) {
    return { ...structured, filePath };
  }

  logger.debug({ filePath }, "markup is unbalanced, falling back to plain text");
  return { ...normalizePlainText(rawLines, true), filePath };
}

interface LineState {
  prose: string[];
  hasProse: boolean;
  hasCode: boolean;
  heading?: Heading;
  callout?: CalloutPurpose;
  list?: "ordered" | "unordered";
  listItem: boolean;
}

interface MacroState {
  name: string;
  block?: CodeBlockState;
}

interface CodeBlockState {
  startLine: number;
  endLine: number;
  codeLines: Set<number>;
  language?: string;
  theme?: string;
}

interface OpenElement {
  name: string;
  code: boolean;
  callout?: CalloutPurpose;
  list?: "ordered" | "unordered";
  heading?: { level: number; line: number; text: string[] };
  macro?: MacroState;
  parameter?: { name: string; macro: MacroState; text: string[] };
  block?: CodeBlockState;
}

function parseMarkup(
  content: string,
  rawLines: string[],
): Omit<Document, "filePath"> | null {
  const lineStarts = computeLineStarts(content);
  const lastLine = rawLines.length;
  const states: LineState[] = rawLines.map(() => ({
    prose: [],
    hasProse: false,
    hasCode: false,
    listItem: false,
  }));
  const stack: OpenElement[] = [];
  const blocks: CodeBlockState[] = [];
  const callouts: Callout[] = [];
  let hasTocMarker = false;
  let unbalanced = false;
  let explicitCloses = 0;
  let justOpened: OpenElement | null = null;

  const lineOf = (index: number): number =>
    Math.min(lastLine, findLine(lineStarts, index));
  const stateAt = (line: number): LineState => states[line - 1];

  const parser = new Parser(
    {
      onopentag(rawName, attribs) {
        const name = rawName.toLowerCase();
        const line = lineOf(parser.startIndex);
        const parent = stack[stack.length - 1];
        const element: OpenElement = {
          name,
          code: CODE_ELEMENTS.has(name) || (parent?.code ?? false),
        };

        const headingMatch = /^h([1-6])$/.exec(name);
        if (headingMatch) {
          element.heading = { level: Number(headingMatch[1]), line, text: [] };
        }

        if (name === "ul" || name === "ol") {
          element.list = name === "ol" ? "ordered" : "unordered";
        }

        if (name === "li") {
          const state = stateAt(line);
          state.listItem = true;
          state.list = innermost(stack, (open) => open.list);
        }

        if (name === "pre") {
          element.block = {
            startLine: line,
            endLine: line,
            codeLines: new Set(),
            language: languageFromAttributes(attribs),
            theme: attribs["data-theme"],
          };
          blocks.push(element.block);
        }

        if (name === "code" && parent?.block && !parent.block.language) {
          parent.block.language = languageFromAttributes(attribs);
        }

        if (name === "ac:structured-macro") {
          const macroName = (attribs["ac:name"] ?? "").toLowerCase();
          element.macro = { name: macroName };

          if (macroName === "toc") {
            hasTocMarker = true;
          }

          if (macroName === "code") {
            element.macro.block = {
              startLine: line,
              endLine: line,
              codeLines: new Set(),
            };
            blocks.push(element.macro.block);
          }

          const purpose = asCalloutPurpose(macroName);
          if (purpose) {
            element.callout = purpose;
            callouts.push({ purpose, line });
          }
        } else if (name !== "ac:parameter") {
          const purpose = calloutFromClass(attribs.class);
          if (purpose) {
            element.callout = purpose;
            callouts.push({ purpose, line });
          }
        }

        if (name === "ac:parameter") {
          const macro = innermost(stack, (open) => open.macro);
          if (macro) {
            element.parameter = {
              name: (attribs["ac:name"] ?? "").toLowerCase(),
              macro,
              text: [],
            };
          }
        }

        if (!INLINE_ELEMENTS.has(name)) {
          stateAt(line).prose.push(" ");
        }

        stack.push(element);
        justOpened = element;
      },

      ontext(data) {
        justOpened = null;
        const startLine = lineOf(parser.startIndex);
        const code = stack[stack.length - 1]?.code ?? false;
        const heading = innermost(stack, (open) => open.heading);
        const parameter = innermost(stack, (open) => open.parameter);
        const callout = innermost(stack, (open) => open.callout);
        const list = innermost(stack, (open) => open.list);
        const block = code
          ? innermost(stack, (open) => open.block ?? open.macro?.block)
          : undefined;

        heading?.text.push(data);
        parameter?.text.push(data);

        // Macro titles are read as prose; other parameters are settings.
        if (parameter && parameter.name !== "title") {
          return;
        }

        data.split("\n").forEach((piece, offset) => {
          const line = Math.min(lastLine, startLine + offset);
          const state = stateAt(line);
          const hasText = piece.trim().length > 0;

          if (code) {
            state.hasCode = state.hasCode || hasText;
            if (hasText) {
              block?.codeLines.add(line);
            }
          } else {
            state.prose.push(piece);
            state.hasProse = state.hasProse || hasText;
          }

          if (hasText && callout && !state.callout) {
            state.callout = callout;
          }
          if (hasText && list && !state.list) {
            state.list = list;
          }
        });
      },

      onclosetag(rawName, isImplied) {
        const name = rawName.toLowerCase();
        const element = stack.pop();
        if (!element) {
          return;
        }

        if (!isImplied) {
          explicitCloses += 1;
        } else if (element !== justOpened && !OPTIONAL_END_ELEMENTS.has(name)) {
          unbalanced = true;
        }
        justOpened = null;

        const endLine = lineOf(Math.max(parser.startIndex, parser.endIndex));

        if (element.heading) {
          const text = collapse(element.heading.text.join(""));
          if (text) {
            stateAt(element.heading.line).heading = {
              level: element.heading.level,
              text,
            };
          }
        }

        if (element.parameter) {
          const { macro } = element.parameter;
          const value = collapse(element.parameter.text.join(""));
          if (macro.block && value) {
            if (element.parameter.name === "language") {
              macro.block.language = value;
            } else if (element.parameter.name === "theme") {
              macro.block.theme = value;
            }
          }
        }

        const block = element.block ?? element.macro?.block;
        if (block) {
          block.endLine = endLine;
        }

        if (!INLINE_ELEMENTS.has(name)) {
          stateAt(endLine).prose.push(" ");
        }
      },
    },
    {
      xmlMode: XML_PATTERN.test(content),
      recognizeSelfClosing: true,
      decodeEntities: true,
    },
  );

  parser.write(content);
  parser.end();

  if (unbalanced || countClosingTags(content) > explicitCloses) {
    return null;
  }

  const lines: DocumentLine[] = states.map((state, index) => {
    const prose = state.prose.join("");
    if (!hasTocMarker && TOC_TEXT_PATTERN.test(prose)) {
      hasTocMarker = true;
    }

    return {
      number: index + 1,
      raw: rawLines[index],
      prose: state.hasProse ? prose : "",
      heading: state.heading,
      inCode: state.hasCode && !state.hasProse,
      callout: state.callout,
      list: state.list,
      listItem: state.listItem,
    };
  });

  return {
    format: "markup",
    degraded: false,
    lines,
    codeBlocks: blocks.map(toCodeBlock),
    callouts,
    hasTocMarker,
  };
}

const FENCE_PATTERN = /^\s*(`{3,}|~{3,})\s*(.*)$/;
const MARKDOWN_HEADING_PATTERN = /^\s{0,3}(#{1,6})\s+(.+?)\s*#*\s*$/;
const HTML_HEADING_PATTERN = /<h([1-6])\b[^>]*>(.*?)<\/h\1\s*>/i;
const CALLOUT_LINE_PATTERN =
  /^\s*(?:>\s*)?(?:\[!(note|warning|tip|info)\]|(?:\*\*|__)?(note|warning|tip|info)(?:\*\*|__)?\s*:)/i;
const BULLET_PATTERN = /^\s*[-*+]\s+\S/;
const NUMBERED_PATTERN = /^\s*\d+[.)]\s+\S/;
const CODE_SPAN_PATTERN = /<code\b[^>]*>.*?<\/code\s*>|<pre\b[^>]*>.*?<\/pre\s*>|`[^`]*`/gi;

function normalizePlainText(
  rawLines: string[],
  degraded: boolean,
): Omit<Document, "filePath"> {
  const lines: DocumentLine[] = [];
  const codeBlocks: CodeBlock[] = [];
  const callouts: Callout[] = [];
  let hasTocMarker = false;
  let fence: { marker: string; block: CodeBlock } | null = null;
  let preBlock: CodeBlock | null = null;

  rawLines.forEach((raw, index) => {
    const number = index + 1;
    const codeLine = (): DocumentLine => ({
      number,
      raw,
      prose: "",
      inCode: raw.trim().length > 0,
      listItem: false,
    });

    const fenceMatch = FENCE_PATTERN.exec(raw);
    if (fence) {
      if (fenceMatch && fenceMatch[1].startsWith(fence.marker) && !fenceMatch[2]) {
        fence.block.endLine = number;
        fence = null;
      } else {
        fence.block.lineCount += 1;
      }
      lines.push(codeLine());
      return;
    }

    if (fenceMatch && !preBlock) {
      const info = fenceMatch[2].trim();
      const block: CodeBlock = {
        startLine: number,
        endLine: rawLines.length,
        lineCount: 0,
        language: info.split(/\s+/).find((token) => token && !token.includes("=")),
        theme: /\btheme=(\S+)/.exec(info)?.[1],
      };
      codeBlocks.push(block);
      fence = { marker: fenceMatch[1], block };
      lines.push(codeLine());
      return;
    }

    if (preBlock) {
      if (/<\/pre\s*>/i.test(raw)) {
        preBlock.endLine = number;
        preBlock = null;
      } else {
        preBlock.lineCount += 1;
      }
      lines.push(codeLine());
      return;
    }

    const preOpen = /<pre\b[^>]*>/i.exec(raw);
    if (preOpen && !/<\/pre\s*>/i.test(raw)) {
      preBlock = {
        startLine: number,
        endLine: rawLines.length,
        lineCount: 0,
        language: /\b(?:lang(?:uage)?-)([\w+#-]+)/i.exec(preOpen[0])?.[1],
      };
      codeBlocks.push(preBlock);
      lines.push(codeLine());
      return;
    }

    const withoutCode = raw.replace(CODE_SPAN_PATTERN, " ");
    const prose = collapseInline(stripMarkup(withoutCode));
    if (TOC_TEXT_PATTERN.test(raw)) {
      hasTocMarker = true;
    }

    const line: DocumentLine = {
      number,
      raw,
      prose,
      inCode: withoutCode !== raw && prose === "",
      listItem: false,
    };

    const heading = MARKDOWN_HEADING_PATTERN.exec(raw);
    const htmlHeading = HTML_HEADING_PATTERN.exec(raw);
    if (heading) {
      line.heading = { level: heading[1].length, text: heading[2] };
    } else if (htmlHeading) {
      const text = collapse(stripMarkup(htmlHeading[2]));
      if (text) {
        line.heading = { level: Number(htmlHeading[1]), text };
      }
    }

    const callout = CALLOUT_LINE_PATTERN.exec(prose || raw);
    if (callout) {
      const purpose = asCalloutPurpose((callout[1] ?? callout[2]).toLowerCase());
      if (purpose) {
        line.callout = purpose;
        callouts.push({ purpose, line: number });
      }
    }

    if (BULLET_PATTERN.test(raw)) {
      line.list = "unordered";
      line.listItem = true;
    } else if (NUMBERED_PATTERN.test(raw)) {
      line.list = "ordered";
      line.listItem = true;
    }

    lines.push(line);
  });

  return {
    format: "text",
    degraded,
    lines,
    codeBlocks,
    callouts,
    hasTocMarker,
  };
}

function computeLineStarts(content: string): number[] {
  const starts = [0];
  for (let i = 0; i < content.length; i += 1) {
    if (content[i] === "\n") {
      starts.push(i + 1);
    }
  }
  return starts;
}

function findLine(lineStarts: number[], index: number): number {
  let low = 0;
  let high = lineStarts.length - 1;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (lineStarts[mid] <= index) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low + 1;
}

function innermost<T>(
  stack: OpenElement[],
  pick: (element: OpenElement) => T | undefined,
): T | undefined {
  for (let i = stack.length - 1; i >= 0; i -= 1) {
    const value = pick(stack[i]);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

function asCalloutPurpose(value: string): CalloutPurpose | undefined {
  return CALLOUT_PURPOSES.find((purpose) => purpose === value);
}

function calloutFromClass(className: string | undefined): CalloutPurpose | undefined {
  if (!className) {
    return undefined;
  }

  for (const token of className.toLowerCase().split(/\s+/)) {
    const purpose = asCalloutPurpose(token.replace(/^(?:callout|admonition|alert)[-_]/, ""));
    if (purpose) {
      return purpose;
    }
  }
  return undefined;
}

function languageFromAttributes(attribs: Record<string, string>): string | undefined {
  const fromClass = /\b(?:lang(?:uage)?-)([\w+#-]+)/.exec(attribs.class ?? "")?.[1];
  return fromClass ?? attribs["data-lang"] ?? attribs["data-language"];
}

function countClosingTags(content: string): number {
  const withoutOpaque = content
    .replace(/<!\[CDATA\[[\s\S]*?\]\]>/g, "")
    .replace(/<!--[\s\S]*?-->/g, "");
  return withoutOpaque.match(CLOSING_TAG_PATTERN)?.length ?? 0;
}

function toCodeBlock(state: CodeBlockState): CodeBlock {
  return {
    startLine: state.startLine,
    endLine: state.endLine,
    lineCount: state.codeLines.size,
    language: state.language,
    theme: state.theme,
  };
}

function stripMarkup(text: string): string {
  return text.replace(/<[^>]*>/g, " ").replace(/`[^`]*`/g, " ");
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function collapseInline(text: string): string {
  return text.trim().length === 0 ? "" : text;
}
