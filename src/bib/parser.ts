// BibTeX 解析：按 @type{ 切块，每块独立提取固定字段；缺字段不算错，解析永不抛错

import { cleanLatex, unescapeLatex } from "./latex.js";
import type { Publication, PublicationField } from "./types.js";


/** 条目块：@type{ 或 @type( 起，到下一个条目起点或文本末尾 */
const ENTRY_PATTERN = /@(\w+)\s*[{(]([\s\S]*?)(?=@\w+\s*[{(]|$)/g;

/** 不是文献的块类型 */
const SKIPPED_TYPES = new Set(["comment", "string", "preamble"]);


interface FieldSpec {
  /** BibTeX 字段名 */
  name: string;
  key: PublicationField;
  /** 合并内部空白 */
  collapse?: boolean;
  /** 值必须满足的格式，不满足视为缺失 */
  pattern?: RegExp;
}


const FIELDS: FieldSpec[] = [
  { name: "title", key: "title", collapse: true },
  { name: "author", key: "authors", collapse: true },
  { name: "year", key: "year", pattern: /^\d{4}$/ },
  { name: "journal", key: "journal", collapse: true },
  { name: "volume", key: "volume" },
  { name: "pages", key: "pages" },
  { name: "eprint", key: "arxiv" },
  { name: "doi", key: "doi" },
];


/** 花括号值：从 open 处的 { 起按深度配对，返回内部文本；未闭合返回 undefined */
function readBraced(text: string, open: number): string | undefined {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(open + 1, i);
    }
  }
  return undefined;
}


/** 引号值：到花括号外、未被反斜杠转义的下一个 " 为止 */
function readQuoted(text: string, open: number): string | undefined {
  let depth = 0;
  for (let i = open + 1; i < text.length; i++) {
    const ch = text[i];
    if (ch === "{") depth++;
    else if (ch === "}") depth = Math.max(0, depth - 1);
    else if (ch === '"' && depth === 0 && text[i - 1] !== "\\") return text.slice(open + 1, i);
  }
  return undefined;
}


interface ValueSpan {
  value: string;
  /** 值之后的位置 */
  end: number;
}


function readValue(text: string, start: number): ValueSpan | undefined {
  const ch = text[start];
  if (ch === "{" || ch === '"') {
    const value = ch === "{" ? readBraced(text, start) : readQuoted(text, start);
    return value === undefined ? undefined : { value, end: start + value.length + 2 };
  }
  const bare = /^[^,})\s]*/.exec(text.slice(start))?.[0] ?? "";
  return { value: bare, end: start + bare.length };
}


/** 字段名及其后的 =，只在字段列表的顶层位置尝试 */
const FIELD_NAME = /\s*([\w-]+)\s*=\s*/y;
const FIELD_SEPARATOR = /\s*,/y;


/** 按顺序走一遍 name = value 列表；值整体跳过，值里出现的 name= 不算字段。同名字段取第一个 */
export function readFields(block: string): Map<string, string> {
  const fields = new Map<string, string>();
  const firstComma = block.indexOf(",");
  // 引用键到第一个逗号为止；没有引用键时从头开始
  let pos = firstComma >= 0 && !block.slice(0, firstComma).includes("=") ? firstComma + 1 : 0;
  while (pos < block.length) {
    FIELD_NAME.lastIndex = pos;
    const name = FIELD_NAME.exec(block);
    if (!name) break;
    const span = readValue(block, pos + name[0].length);
    if (!span) break;
    const key = name[1].toLowerCase();
    if (!fields.has(key)) fields.set(key, span.value);
    FIELD_SEPARATOR.lastIndex = span.end;
    if (!FIELD_SEPARATOR.exec(block)) break;
    pos = FIELD_SEPARATOR.lastIndex;
  }
  return fields;
}


/** 取字段原始值；字段名按整词匹配（booktitle 不算 title），大小写不敏感 */
export function readField(block: string, name: string): string | undefined {
  return readFields(block).get(name.toLowerCase());
}


function normalizeValue(raw: string, field: FieldSpec): string | undefined {
  const collapsed = field.collapse ? raw.replace(/\s+/g, " ") : raw;
  const value = cleanLatex(collapsed).trim();
  if (!value) return undefined;
  if (field.pattern && !field.pattern.test(value)) return undefined;
  return value;
}


/** 解析单个条目块的正文，返回提取到的字段（可能为空对象） */
export function parseEntry(block: string): Publication {
  const pub: Publication = {};
  const fields = readFields(block);
  for (const field of FIELDS) {
    const raw = fields.get(field.name);
    if (raw === undefined) continue;
    const value = normalizeValue(raw, field);
    if (value !== undefined) pub[field.key] = value;
  }
  return pub;
}


/** 解析整份 .bib 文本；一个字段都没有的块直接丢弃，顺序与源文件一致 */
export function parseBibtex(source: string): Publication[] {
  const text = unescapeLatex(source);
  const out: Publication[] = [];
  for (const m of text.matchAll(ENTRY_PATTERN)) {
    const type = m[1].toLowerCase();
    if (SKIPPED_TYPES.has(type)) continue;
    const pub = parseEntry(m[2]);
    if (Object.keys(pub).length > 0) out.push(pub);
  }
  return out;
}


function yearKey(pub: Publication): number {
  return pub.year ? Number.parseInt(pub.year, 10) : 0;
}


/** 按年份降序（稳定排序），无年份视为 0 排最后 */
export function sortByYearDesc(pubs: readonly Publication[]): Publication[] {
  return [...pubs].sort((a, b) => yearKey(b) - yearKey(a));
}
