/**
 * Fluent construction of documents.
 *
 * ```ts
 * const doc = new DocumentBuilder()
 *   .withDefaultProperty('app', 'demo')
 *   .withSection('server', s => s.withProperty('port', 8080).withComment('main'))
 *   .build();
 * ```
 */

import { Comment } from './comment';
import { Document } from './document';
import type { DocumentOptions } from './document';
import { Property } from './property';
import { Section } from './section';
import type { ScalarValue } from './value-codec';

export class SectionBuilder {
  constructor(
    private readonly section: Section,
    private readonly commentPrefix: string
  ) {}

  withProperty(property: Property): this;
  withProperty(key: string, value: ScalarValue): this;
  withProperty(keyOrProperty: string | Property, value: ScalarValue = ''): this {
    if (typeof keyOrProperty === 'string') {
      this.section.add(new Property(keyOrProperty).withValue(value));
    } else {
      this.section.add(keyOrProperty.clone());
    }
    return this;
  }

  withQuotedProperty(key: string, value: string): this {
    this.section.add(new Property(key, value).withQuoted());
    return this;
  }

  withComment(text: string): this {
    this.section.comment = new Comment(text, this.commentPrefix);
    return this;
  }

  withPreComment(text: string): this {
    this.section.preComments.add(new Comment(text, this.commentPrefix));
    return this;
  }
}

export class DocumentBuilder {
  private readonly doc: Document;

  constructor(options?: DocumentOptions) {
    this.doc = new Document(options);
  }

  /** Starts from a deep copy of `source`. */
  static from(source: Document): DocumentBuilder {
    const builder = new DocumentBuilder({
      commentPrefixChars: source.commentPrefixChars,
      defaultCommentPrefixChar: source.defaultCommentPrefixChar,
    });
    for (const property of source.defaultSection) {
      builder.doc.defaultSection.add(property.clone());
    }
    for (const section of source) {
      builder.doc.add(section.clone());
    }
    return builder;
  }

  withSection(name: string, configure?: (section: SectionBuilder) => void): this {
    const section = new Section(name);
    configure?.(new SectionBuilder(section, this.doc.defaultCommentPrefixChar));
    this.doc.add(section);
    return this;
  }

  withDefaultProperty(property: Property): this;
  withDefaultProperty(key: string, value: ScalarValue): this;
  withDefaultProperty(keyOrProperty: string | Property, value: ScalarValue = ''): this {
    if (typeof keyOrProperty === 'string') {
      this.doc.defaultSection.add(new Property(keyOrProperty).withValue(value));
    } else {
      this.doc.defaultSection.add(keyOrProperty.clone());
    }
    return this;
  }

  build(): Document {
    return this.doc;
  }
}
