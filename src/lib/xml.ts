/**
 * XML Document
 * XML 文件值 - 包裝 fast-xml-parser 的解析結果，可再序列化
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';

export type XmlNode = Record<string, unknown>;

const PARSER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  trimValues: true,
} as const;

const BUILDER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: false,
} as const;

export class XmlParseError extends Error {
  readonly line: number | undefined;

  constructor(message: string, line?: number) {
    super(message);
    this.name = 'XmlParseError';
    this.line = line;
  }
}

export class XmlDocument {
  readonly root: XmlNode;

  constructor(root: XmlNode) {
    this.root = root;
  }

  /**
   * 解析 XML 字串，格式錯誤時拋出 XmlParseError
   */
  static parse(xml: string): XmlDocument {
    if (xml.trim().length === 0) {
      throw new XmlParseError('Empty XML document');
    }

    const result = XMLValidator.validate(xml);
    if (result !== true) {
      throw new XmlParseError(result.err.msg, result.err.line);
    }

    const parsed: XmlNode = new XMLParser(PARSER_OPTIONS).parse(xml);
    return new XmlDocument(parsed);
  }

  /**
   * 取得第一層元素（不含 XML 宣告）
   */
  get rootName(): string | undefined {
    return Object.keys(this.root).find((key) => !key.startsWith('?'));
  }

  toString(): string {
    const builder = new XMLBuilder(BUILDER_OPTIONS);
    return builder.build(this.root);
  }
}
