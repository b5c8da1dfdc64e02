// Sheet Name Sanitizer - Turns arbitrary labels into valid, unique worksheet names

/** Excel's limit on worksheet name length */
export const MAX_SHEET_NAME_LENGTH = 31;

/** Name used when a label has nothing left after cleaning */
export const DEFAULT_SHEET_NAME = 'sheet';

const FORBIDDEN_CHARS = /[:\\\/?*[\]]/g;
const EDGE_APOSTROPHES = /^'+|'+$/g;

// Excel reserves this name for its change-tracking sheet
const RESERVED_NAMES = new Set(['history']);

// Cut to `length` UTF-16 units without leaving half of a surrogate pair
function truncate(text: string, length: number): string {
  const cut = text.slice(0, length);
  return /[\uD800-\uDBFF]$/.test(cut) ? cut.slice(0, -1) : cut;
}

/**
 * Produce a worksheet name for a label that is valid in Excel and not yet used.
 *
 * Forbidden characters become underscores and the result is cut to 31
 * characters; a label with nothing else in it becomes `sheet`. Collisions,
 * compared case-insensitively as Excel does, get the smallest free `_N`
 * suffix. The chosen name is added to `used` before it is returned.
 *
 * @param label - Candidate label, any text
 * @param used - Names already assigned in the current export
 */
export function sanitizeSheetName(label: string, used: Set<string>): string {
  // A label made only of forbidden characters, blanks or quotes has nothing to keep
  const meaningful = label.replace(FORBIDDEN_CHARS, '').replace(/['\s]/g, '');
  const cleaned = truncate(label.replace(FORBIDDEN_CHARS, '_'), MAX_SHEET_NAME_LENGTH).replace(EDGE_APOSTROPHES, '');
  const base = meaningful && cleaned ? cleaned : DEFAULT_SHEET_NAME;

  const taken = new Set(Array.from(used, name => name.toLowerCase()));
  const isFree = (name: string) => !taken.has(name.toLowerCase()) && !RESERVED_NAMES.has(name.toLowerCase());

  let name = base;
  for (let suffix = 1; !isFree(name); suffix++) {
    const tail = `_${suffix}`;
    name = truncate(base, MAX_SHEET_NAME_LENGTH - tail.length) + tail;
  }

  used.add(name);
  return name;
}

/**
 * Allocates sheet names for one export run.
 * A new allocator starts with no names in use.
 */
export class SheetNameAllocator {
  private readonly used = new Set<string>();

  allocate(label: string): string {
    return sanitizeSheetName(label, this.used);
  }

  /**
   * Give a name back, e.g. when its sheet could not be written.
   */
  release(name: string): void {
    this.used.delete(name);
  }
}
