/**
 * Markup Layout — turns expanded template text into a DocumentModel.
 *
 * Line based:
 *   # / ## / ###      heading levels 1-3
 *   - item / * item   bullet
 *   ---               page break
 *   <blank line>      paragraph separator
 *   anything else     paragraph text; consecutive lines are joined
 *
 * Images are inserted by the `image` helper as placeholder lines (see
 * imagePlaceholder) and resolved against the list it collected.
 */

import type { Block, DocumentModel } from "./types.js";

export type PlacedImage = Extract<Block, { kind: "image" }>;

const PLACEHOLDER_MARK = "\uE000";
const PLACEHOLDER_LINE = /^\uE000img(\d+)\uE000$/;
const HEADING = /^(#{1,3})\s+(.*)$/;
const BULLET = /^[-*]\s+(.*)$/;

export function imagePlaceholder(index: number): string {
  return `\n${PLACEHOLDER_MARK}img${index}${PLACEHOLDER_MARK}\n`;
}

export function layoutMarkup(text: string, images: readonly PlacedImage[] = []): DocumentModel {
  const blocks: Block[] = [];
  let paragraph: string[] = [];

  const flush = () => {
    if (paragraph.length > 0) {
      blocks.push({ kind: "paragraph", text: collapse(paragraph.join(" ")) });
      paragraph = [];
    }
  };

  for (const raw of text.replace(/\r\n?/g, "\n").split("\n")) {
    const line = raw.replace(/\t/g, "    ").trim();

    if (line === "") {
      flush();
      continue;
    }

    const placeholder = PLACEHOLDER_LINE.exec(line);
    if (placeholder) {
      flush();
      const image = images[Number(placeholder[1])];
      if (image) blocks.push(image);
      continue;
    }

    if (line === "---") {
      flush();
      blocks.push({ kind: "pageBreak" });
      continue;
    }

    const heading = HEADING.exec(line);
    if (heading) {
      flush();
      blocks.push({ kind: "heading", level: headingLevel(heading[1].length), text: collapse(heading[2]) });
      continue;
    }

    const bullet = BULLET.exec(line);
    if (bullet) {
      flush();
      blocks.push({ kind: "bullet", text: collapse(bullet[1]) });
      continue;
    }

    paragraph.push(line);
  }
  flush();

  return { blocks };
}

function headingLevel(hashes: number): 1 | 2 | 3 {
  if (hashes <= 1) return 1;
  if (hashes === 2) return 2;
  return 3;
}

function collapse(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}
