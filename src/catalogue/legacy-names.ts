/**
 * Reads a variable-definition document into a table mapping each legacy
 * variable name to its canonical name.
 *
 * Only two line kinds matter: `VariableName: <name>` sets the canonical name
 * for the lines that follow, and `RenameFrom: <old> [<old>...]` maps every
 * listed name to it. Everything else is ignored.
 */
export function parseLegacyNames(text: string): Map<string, string> {
  const names = new Map<string, string>();
  let preferred = "";

  for (const line of text.split("\n")) {
    const fields = line.split(/\s+/).filter((f) => f.length > 0);
    if (fields.length < 2) continue;

    if (fields[0] === "VariableName:") preferred = fields[1];
    if (fields[0] === "RenameFrom:") {
      for (const legacy of fields.slice(1)) names.set(legacy, preferred);
    }
  }
  return names;
}
