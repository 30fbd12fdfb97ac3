// src/tmx/document.ts
import { readFile } from "node:fs/promises";
import { DOMParser } from "@xmldom/xmldom";

import { DocumentError } from "./errors.js";

/** Read-only view of one XML element. */
export interface DocElement {
  readonly name: string;
  /** Document the element came from; used in error messages. */
  readonly path: string;
  readonly children: ReadonlyArray<DocElement>;
  readonly text: string;

  attr(name: string): string | undefined;
  stringAttr(name: string, fallback: string): string;
  intAttr(name: string, fallback: number): number;
  floatAttr(name: string, fallback: number): number;
  child(name: string): DocElement | undefined;
  childrenNamed(name: string): DocElement[];
}

export interface DocumentProvider {
  read(path: string): Promise<DocElement>;
}

const ELEMENT_NODE = 1;
const INT_RE = /^[+-]?\d+$/;

class XmlElement implements DocElement {
  public constructor(
    public readonly name: string,
    public readonly path: string,
    private readonly attributes: ReadonlyMap<string, string>,
    public readonly children: ReadonlyArray<DocElement>,
    public readonly text: string,
  ) {}

  public attr(name: string): string | undefined {
    return this.attributes.get(name);
  }

  public stringAttr(name: string, fallback: string): string {
    return this.attributes.get(name) ?? fallback;
  }

  public intAttr(name: string, fallback: number): number {
    const raw = this.attributes.get(name);
    if (raw === undefined) return fallback;
    const s = raw.trim();
    if (!INT_RE.test(s)) {
      throw new DocumentError(this.path, `<${this.name}> ${name}="${raw}" is not an integer`);
    }
    return Number.parseInt(s, 10);
  }

  public floatAttr(name: string, fallback: number): number {
    const raw = this.attributes.get(name);
    if (raw === undefined) return fallback;
    const v = raw.trim() === "" ? Number.NaN : Number(raw);
    if (!Number.isFinite(v)) {
      throw new DocumentError(this.path, `<${this.name}> ${name}="${raw}" is not a number`);
    }
    return v;
  }

  public child(name: string): DocElement | undefined {
    return this.children.find((c) => c.name === name);
  }

  public childrenNamed(name: string): DocElement[] {
    return this.children.filter((c) => c.name === name);
  }
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function toDocElement(el: Element, path: string): DocElement {
  const attributes = new Map<string, string>();
  for (let i = 0; i < el.attributes.length; i++) {
    const a = el.attributes.item(i);
    if (a) attributes.set(a.name, a.value);
  }

  const children: DocElement[] = [];
  for (let i = 0; i < el.childNodes.length; i++) {
    const node = el.childNodes.item(i);
    if (node && isElement(node)) children.push(toDocElement(node, path));
  }

  return new XmlElement(el.nodeName, path, attributes, children, el.textContent ?? "");
}

/** Parse XML text into an element tree rooted at the document element. */
export function parseXmlDocument(xml: string, path: string): DocElement {
  const problems: string[] = [];
  const record = (msg: unknown): void => {
    problems.push(String(msg).trim());
  };
  const parser = new DOMParser({
    errorHandler: { warning: () => {}, error: record, fatalError: record },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(xml, "text/xml");
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new DocumentError(path, `XML parse error: ${msg}`, { cause: err });
  }
  if (problems.length > 0) throw new DocumentError(path, `XML parse error: ${problems[0]}`);

  const root = doc.documentElement;
  if (!root) throw new DocumentError(path, "document has no root element");
  return toDocElement(root, path);
}

export function createFileDocumentProvider(): DocumentProvider {
  return {
    async read(path: string): Promise<DocElement> {
      let text: string;
      try {
        text = await readFile(path, "utf8");
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        throw new DocumentError(path, `cannot read document: ${msg}`, { cause: err });
      }
      return parseXmlDocument(text, path);
    },
  };
}

/** Serves documents from memory; paths must match exactly. */
export function createMemoryDocumentProvider(
  files: Readonly<Record<string, string>>,
): DocumentProvider {
  return {
    async read(path: string): Promise<DocElement> {
      const text = files[path];
      if (text === undefined) throw new DocumentError(path, "cannot read document: not found");
      return parseXmlDocument(text, path);
    },
  };
}
