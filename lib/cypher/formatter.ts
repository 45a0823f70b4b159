// Format Cypher for display

const CLAUSE_START =
  /^(OPTIONAL MATCH|MATCH|WHERE|WITH|RETURN|ORDER BY|SKIP|LIMIT|UNWIND|CALL|UNION|CREATE|MERGE|DELETE|DETACH|SET|REMOVE)\b/i;

export function formatCypher(query: string): string {
  let formatted = query.trim();

  formatted = formatted.replace(/\r\n?/g, "\n");
  formatted = formatted.replace(/\n{3,}/g, "\n\n");

  const formattedLines: string[] = [];
  let indentLevel = 0;

  for (const line of formatted.split("\n")) {
    const trimmed = line.trim().replace(/[ \t]+/g, " ");
    if (!trimmed) {
      formattedLines.push("");
      continue;
    }

    if (trimmed.startsWith("}")) {
      indentLevel = Math.max(0, indentLevel - 1);
    }

    // Continuation lines of a clause sit one level deeper
    const continuation = indentLevel === 0 && !CLAUSE_START.test(trimmed) ? 1 : 0;
    formattedLines.push("  ".repeat(indentLevel + continuation) + trimmed);

    if (trimmed.endsWith("{")) {
      indentLevel++;
    }
  }

  return formattedLines.join("\n");
}
