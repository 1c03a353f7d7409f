// server/src/utils/zodError.ts
import type { ZodError, ZodIssue } from "zod";

type SimpleIssue = {
  code: string;
  path: string;
  message: string;
  expected?: string;
  received?: string;
};

function simplify(i: ZodIssue): SimpleIssue {
  const out: SimpleIssue = { code: i.code, path: i.path.join("."), message: i.message };
  if (i.code === "invalid_type") {
    out.expected = i.expected;
    out.received = i.received;
  }
  return out;
}

export function formatZodError(err: ZodError) {
  // Flatten union branch errors so you can see which branch failed on what
  const unionBranches = err.issues.flatMap((i) =>
    i.code === "invalid_union" ? i.unionErrors.flatMap((e) => e.issues) : []
  );

  const top = err.issues.map(simplify);
  const union = unionBranches.map((i) => ({ ...simplify(i), _union: true }));

  return { top, union };
}
