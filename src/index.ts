export { convertMarkdownToTypst } from './core/Converter';
export type { ConvertOptions, ConversionResult, ConversionBackend } from './core/Converter';

export { consoleReporter, silentReporter } from './core/Reporter';
export type { ConversionReporter } from './core/Reporter';

export { extractFrontMatter, parseFrontMatterBlock } from './parser/FrontMatterParser';
export type { FrontMatter, FrontMatterResult } from './parser/FrontMatterParser';

export { segmentSlides, boundaryLevel, headingTitle } from './parser/SlideParser';

export { parseMarkdown, parseMdast } from './parser/MarkdownParser';

export { buildDeck } from './model/Deck';
export type { DeckData } from './model/Deck';

export { renderNode } from './renderer/NodeRenderer';
export type { RenderContextOptions } from './renderer/RenderContext';

export { renderSlide, createAstConverter } from './renderer/SlideRenderer';
export type {
  SlideRendererOptions,
  BodyConverter,
  QuotingMode,
} from './renderer/SlideRenderer';

export { assembleDocument, renderHeader } from './renderer/DocumentRenderer';
export type { HeaderOptions } from './renderer/DocumentRenderer';

export { createPandocConverter } from './utils/pandoc';
export type { PandocOptions } from './utils/pandoc';

export { escapeMarkup, escapeString } from './utils/escape';

// Model types
export type { SlideData, SlideLevel } from './model/Slide';
export type {
  SyntaxNode,
  SyntaxNodeKind,
  DocumentNode,
  ParagraphNode,
  TextNode,
  EmphasisNode,
  StrongNode,
  StrikethroughNode,
  LineBreakNode,
  LinkNode,
  ImageNode,
  FootnoteNode,
  CodeSpanNode,
  CodeBlockNode,
  BlockQuoteNode,
  ListNode,
  ListItemNode,
  HeadingNode,
  ThematicBreakNode,
  TableNode,
  TableCellNode,
  UnknownNode,
  SyntaxTreeOptions,
} from './model/SyntaxNode';
