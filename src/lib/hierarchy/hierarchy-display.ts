/**
 * Hierarchy display helpers
 */

const HOME_SEGMENT = 'HOME';
export const HIERARCHY_SEPARATOR = ' > ';

/**
 * Display form of a hierarchy: the first element is always the root label and
 * a site-name segment at position 1 appears only once.
 *
 * ["Agency", "Agency", "Services", "Agency", "Apply"] -> ["Raiz", "Agency", "Services", "Apply"]
 */
export function displayHierarchy(hierarchy: string[], rootLabel: string): string[] {
  const processed = [rootLabel];
  if (hierarchy.length <= 1) {
    return processed;
  }

  const excluded = [HOME_SEGMENT, rootLabel];
  const siteName = hierarchy[1];

  if (siteName && !excluded.includes(siteName)) {
    processed.push(siteName);
    for (const part of hierarchy.slice(2)) {
      if (part && part !== siteName) {
        processed.push(part);
      }
    }
  } else {
    for (const part of hierarchy.slice(1)) {
      if (part && !excluded.includes(part)) {
        processed.push(part);
      }
    }
  }

  return processed;
}

export function formatHierarchy(hierarchy: string[], rootLabel: string): string {
  return displayHierarchy(hierarchy, rootLabel).join(HIERARCHY_SEPARATOR);
}
