import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigurationError } from "./errors.js";
import { errorMessage } from "./utils.js";

export interface MessageTree {
  [key: string]: string | MessageTree;
}

export type TemplateValue = string | number;

export const LANGUAGE_DIR = fileURLToPath(new URL("../language", import.meta.url));

const PLACEHOLDER = /\{(\w+)(?::([^}]*))?\}/g;
const FORMAT_SPEC = /^([<>^])?(\d+)?(?:\.(\d+)f)?$/;
const LANG_CODE = /^[A-Za-z0-9_-]+$/;

function applyFormat(name: string, value: TemplateValue, spec: string): string {
  const match = FORMAT_SPEC.exec(spec);
  if (!match) {
    throw new ConfigurationError(`Unsupported format "${spec}" for placeholder {${name}}`);
  }
  const [, align, width, precision] = match;

  let text: string;
  if (precision !== undefined) {
    if (typeof value !== "number") {
      throw new ConfigurationError(`Placeholder {${name}} needs a number for format "${spec}"`);
    }
    text = value.toFixed(Number(precision));
  } else {
    text = String(value);
  }

  if (width === undefined) return text;

  const size = Number(width);
  switch (align ?? (typeof value === "number" ? ">" : "<")) {
    case ">":
      return text.padStart(size);
    case "^": {
      const left = Math.floor(Math.max(0, size - text.length) / 2);
      return text.padStart(text.length + left).padEnd(size);
    }
    default:
      return text.padEnd(size);
  }
}

/**
 * Fills `{name}` placeholders. A placeholder may carry a format spec after a
 * colon: alignment (`<`, `>`, `^`), a width and a fixed precision (`.2f`).
 */
export function formatTemplate(template: string, params: Record<string, TemplateValue>): string {
  return template.replace(PLACEHOLDER, (_match, name: string, spec: string | undefined) => {
    const value = Object.hasOwn(params, name) ? params[name] : undefined;
    if (value === undefined) {
      throw new ConfigurationError(`Template placeholder {${name}} has no value`);
    }
    return applyFormat(name, value, spec ?? "");
  });
}

function toMessageTree(value: unknown, where: string): MessageTree {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ConfigurationError(`Language pack entry "${where}" must be a mapping`);
  }

  const tree: MessageTree = {};
  for (const [key, entry] of Object.entries(value)) {
    const at = where ? `${where}.${key}` : key;
    if (typeof entry === "string" || typeof entry === "number") {
      tree[key] = String(entry);
    } else {
      tree[key] = toMessageTree(entry, at);
    }
  }
  return tree;
}

/** Message lookup for one display language. Keys are dot paths into the pack. */
export class LanguagePack {
  readonly code: string;
  private readonly messages: MessageTree;

  constructor(code: string, messages: MessageTree) {
    this.code = code;
    this.messages = messages;
  }

  static fromObject(code: string, data: unknown): LanguagePack {
    return new LanguagePack(code, toMessageTree(data, ""));
  }

  private lookup(key: string): string | undefined {
    let node: string | MessageTree | undefined = this.messages;
    for (const part of key.split(".")) {
      if (node === undefined || typeof node === "string") return undefined;
      node = Object.hasOwn(node, part) ? node[part] : undefined;
    }
    return typeof node === "string" ? node : undefined;
  }

  has(key: string): boolean {
    return this.lookup(key) !== undefined;
  }

  t(key: string, params: Record<string, TemplateValue> = {}): string {
    const template = this.lookup(key);
    if (template === undefined) {
      throw new ConfigurationError(`Missing message "${key}" in language pack "${this.code}"`);
    }
    return formatTemplate(template, params);
  }

  assertKeys(keys: readonly string[]): void {
    const missing = keys.filter((key) => !this.has(key));
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Language pack "${this.code}" is missing: ${missing.join(", ")}`
      );
    }
  }
}

export async function loadLanguagePack(code: string, dir: string = LANGUAGE_DIR): Promise<LanguagePack> {
  if (!LANG_CODE.test(code)) {
    throw new ConfigurationError(`Invalid language code: ${code}`);
  }

  const file = path.join(dir, `${code.toLowerCase()}.yaml`);
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Language pack "${code}" not found at ${file}: ${errorMessage(err)}`);
  }

  let data: unknown;
  try {
    data = YAML.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Language pack ${file} is not valid YAML: ${errorMessage(err)}`);
  }

  return LanguagePack.fromObject(code, data);
}
