import TurndownService from 'turndown';

import { getErrorMessage } from '../utils/error-utils.js';

import { logDebug } from '../services/logger.js';

const MULTIPLE_NEWLINES = /\n{3,}/g;
const TAG_PATTERN = /<[^>]*>/g;
const WHITESPACE_RUN = /\s+/g;

const CODE_LANGUAGE_PATTERNS: readonly RegExp[] = [
  /(?:^|\s)language-([\w+#-]+)/,
  /(?:^|\s)lang-([\w+#-]+)/,
] as const;

let turndownInstance: TurndownService | null = null;

function getTurndown(): TurndownService {
  if (turndownInstance) return turndownInstance;
  turndownInstance = createTurndownInstance();
  return turndownInstance;
}

function createTurndownInstance(): TurndownService {
  const instance = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    emDelimiter: '_',
    bulletListMarker: '-',
  });

  addNoiseRule(instance);
  addFencedCodeRule(instance);

  return instance;
}

function addNoiseRule(instance: TurndownService): void {
  instance.addRule('removeNoise', {
    filter: ['script', 'style', 'noscript', 'iframe'],
    replacement: () => '',
  });
}

function addFencedCodeRule(instance: TurndownService): void {
  instance.addRule('fencedCodeBlockWithLanguage', {
    filter: (node, options) => isFencedCodeBlock(node, options),
    replacement: (_content, node) => formatFencedCodeBlock(node),
  });
}

function isElementNode(node: Node): node is Element {
  return node.nodeType === 1;
}

function isFencedCodeBlock(
  node: TurndownService.Node,
  options: TurndownService.Options
): boolean {
  if (options.codeBlockStyle !== 'fenced') return false;
  if (node.nodeName !== 'PRE') return false;
  const { firstChild } = node;
  if (!firstChild) return false;
  return firstChild.nodeName === 'CODE';
}

function formatFencedCodeBlock(node: TurndownService.Node): string {
  const codeNode = node.firstChild;
  if (!codeNode || !isElementNode(codeNode)) return '';
  const code = codeNode.textContent ?? '';
  const language = resolveCodeLanguage(codeNode);
  return `\n\n\`\`\`${language}\n${code.replace(/\n$/, '')}\n\`\`\`\n\n`;
}

function resolveCodeLanguage(codeNode: Element): string {
  const className = codeNode.getAttribute('class') ?? '';
  for (const pattern of CODE_LANGUAGE_PATTERNS) {
    const match = pattern.exec(className);
    if (match?.[1]) return match[1];
  }
  return '';
}

/** Tag-stripped text with whitespace runs collapsed to single spaces. */
export function extractPlainText(html: string): string {
  return html.replace(TAG_PATTERN, ' ').replace(WHITESPACE_RUN, ' ').trim();
}

function convertHtmlToMarkdown(html: string): string {
  return getTurndown().turndown(html).replace(MULTIPLE_NEWLINES, '\n\n').trim();
}

/**
 * Converts an HTML document to Markdown. Never throws: a converter failure
 * falls back to the document's plain text.
 */
export function htmlToMarkdown(html: string): string {
  if (!html) return '';

  try {
    return convertHtmlToMarkdown(html);
  } catch (error) {
    logDebug('Markdown conversion failed, using plain text', {
      error: getErrorMessage(error),
    });
    return extractPlainText(html);
  }
}
