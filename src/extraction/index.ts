export * from './types.js';
export { splitFrontmatter, parseFrontmatterBlock, toFrontmatterEntries } from './frontmatter.js';
export { extractHeadings, toPlainText, countWords } from './markdown.js';
export { normalizeTag } from './tags.js';
export { extractLinks, isInternalTarget, type LinkSyntax } from './links.js';
export { MarkdownDialect } from './dialects/base.js';
export { GenericDialect } from './dialects/generic.js';
export { WikiLinkDialect } from './dialects/wiki-link.js';
export { StaticSiteDialect } from './dialects/static-site.js';
export { NoteAppDialect } from './dialects/note-app.js';
export { DialectRegistry, createDialectRegistry, defaultDialects, decodeText } from './registry.js';
