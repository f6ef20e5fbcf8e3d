import { SaxesParser } from 'saxes';

import { TextLayersError } from '../core/errors.js';

/** 1-based source position of an element's start tag. */
export interface XmlLocation {
  line: number;
  column: number;
}

/** Element node with prefix-free names and an indexed path for diagnostics. */
export interface XmlElement {
  name: string;
  attributes: Readonly<Record<string, string>>;
  children: XmlElement[];
  /** Concatenated character data directly inside this element. */
  text: string;
  location: XmlLocation;
  path: string;
}

/** Malformed XML; the code doubles as the import diagnostic code. */
export class XmlParseError extends TextLayersError {
  readonly location?: XmlLocation;

  constructor(message: string, location?: XmlLocation) {
    super('XML_NOT_WELL_FORMED', message);
    this.name = 'XmlParseError';
    this.location = location;
  }
}

interface ElementBuilder extends XmlElement {
  children: ElementBuilder[];
  siblingCounts: Map<string, number>;
}

/** Parse a document into an element tree. Throws `XmlParseError` on the first well-formedness error. */
export function parseXml(xml: string, sourceName?: string): XmlElement {
  const parser = new SaxesParser({ xmlns: true, position: true, fileName: sourceName });
  const stack: ElementBuilder[] = [];
  const tagStarts: XmlLocation[] = [];
  let root: ElementBuilder | undefined;
  let failure: XmlParseError | undefined;

  parser.on('error', (error) => {
    failure ??= new XmlParseError(error.message, { line: parser.line, column: parser.column + 1 });
  });

  parser.on('opentagstart', () => {
    tagStarts.push({ line: parser.line, column: parser.column + 1 });
  });

  parser.on('opentag', (tag) => {
    const parent = stack.at(-1);
    const name = localName(tag.name);
    const attributes: Record<string, string> = {};
    for (const [key, value] of Object.entries(tag.attributes)) {
      if (key === 'xmlns' || key.startsWith('xmlns:')) {
        continue;
      }
      attributes[localName(key)] = typeof value === 'string' ? value : value.value;
    }

    const element: ElementBuilder = {
      name,
      attributes,
      children: [],
      text: '',
      location: tagStarts.pop() ?? { line: parser.line, column: parser.column + 1 },
      path: elementPath(parent, name),
      siblingCounts: new Map()
    };

    if (parent) {
      parent.children.push(element);
    } else {
      root = element;
    }
    stack.push(element);
  });

  const appendText = (chunk: string): void => {
    const current = stack.at(-1);
    if (current) {
      current.text += chunk;
    }
  };
  parser.on('text', appendText);
  parser.on('cdata', appendText);

  parser.on('closetag', () => {
    stack.pop();
  });

  parser.write(xml).close();

  if (failure) {
    throw failure;
  }
  if (!root) {
    throw new XmlParseError('Document has no root element.');
  }

  return seal(root);
}

function localName(qualified: string): string {
  const colon = qualified.indexOf(':');
  return colon === -1 ? qualified : qualified.slice(colon + 1);
}

function elementPath(parent: ElementBuilder | undefined, name: string): string {
  if (!parent) {
    return `/${name}[1]`;
  }

  const position = (parent.siblingCounts.get(name) ?? 0) + 1;
  parent.siblingCounts.set(name, position);
  return `${parent.path}/${name}[${position}]`;
}

function seal(element: ElementBuilder): XmlElement {
  return {
    name: element.name,
    attributes: element.attributes,
    children: element.children.map(seal),
    text: element.text,
    location: element.location,
    path: element.path
  };
}
