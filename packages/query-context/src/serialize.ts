import type { ContextBundle } from "./context-assembler.ts";

/**
 * JSON with a fixed key order, so equal bundles serialize to identical bytes.
 */
export function serializeContextBundle(bundle: ContextBundle): string {
  return JSON.stringify({
    sections: bundle.sections.map((section) => ({
      category: section.category,
      fileId: section.fileId,
      sheetName: section.sheetName,
      items: section.items.map((item) => ({
        address: item.address,
        displayText: item.displayText,
        ...(item.label !== undefined ? { label: item.label } : {}),
      })),
      matchedCount: section.matchedCount,
      returnedCount: section.returnedCount,
    })),
    estimatedTokenCount: bundle.estimatedTokenCount,
    truncated: bundle.truncated,
    filesConsidered: bundle.filesConsidered,
  });
}
