import { z } from "zod";

const CountSchema = z.number().int().nonnegative();

export const SheetDescriptorSchema = z.object({
  fileId: z.string().min(1),
  name: z.string().min(1),
  rowCount: CountSchema,
  columnCount: CountSchema,
  cellCount: CountSchema,
});

export const FileDescriptorSchema = z
  .object({
    fileId: z.string().min(1),
    displayName: z.string().min(1),
    ingestedAt: z.string().datetime({ offset: true }),
    sheets: z.array(SheetDescriptorSchema),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.sheets.forEach((sheet, index) => {
      if (sheet.fileId !== file.fileId) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sheets", index, "fileId"],
          message: `sheet belongs to file "${sheet.fileId}"`,
        });
      }
      if (seen.has(sheet.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sheets", index, "name"],
          message: `duplicate sheet name "${sheet.name}"`,
        });
      }
      seen.add(sheet.name);
    });
  });

export function describeZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
