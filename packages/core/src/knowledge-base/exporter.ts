/**
 * Tree export: renders a section forest as indented plain text.
 *
 *   1 Annual Report 2024
 *     Fiscal year overview.
 *
 *     1.1 Revenue Analysis
 *       Revenue was $100M.
 *
 * Each level indents by two spaces; content sits one level deeper than its header.
 * Human-readable only, not meant to be parsed back.
 */

import type { Section } from '../sections/schemas.js'

export interface SectionTreeNode {
  section: Section
  children: SectionTreeNode[]
}

const INDENT = '  '

function renderBlock(section: Section, level: number): string {
  const indent = INDENT.repeat(level)
  const lines = [`${indent}${section.path} ${section.header}`]

  if (section.content.length > 0) {
    for (const line of section.content.split(/\r?\n/)) {
      lines.push(line.length > 0 ? `${indent}${INDENT}${line}` : '')
    }
  }

  return lines.join('\n')
}

/** Depth-first, sibling order preserved. */
export function flattenTree(nodes: SectionTreeNode[]): Section[] {
  const flat: Section[] = []
  const visit = (node: SectionTreeNode): void => {
    flat.push(node.section)
    node.children.forEach(visit)
  }
  nodes.forEach(visit)
  return flat
}

export function renderSectionTree(nodes: SectionTreeNode[]): string {
  const blocks: string[] = []
  const visit = (node: SectionTreeNode, level: number): void => {
    blocks.push(renderBlock(node.section, level))
    for (const child of node.children) visit(child, level + 1)
  }
  for (const node of nodes) visit(node, 0)

  return blocks.length > 0 ? `${blocks.join('\n\n')}\n` : ''
}
