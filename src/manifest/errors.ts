/**
 * A manifest document that cannot be used. `issues` lists every problem
 * found in the document, not only the first one.
 */
export class ManifestError extends Error {
  constructor(
    public readonly issues: readonly string[],
    public readonly source?: string,
  ) {
    const where = source ? ` (${source})` : '';
    super(issues.length === 1 ? `Invalid manifest${where}: ${issues[0]}` : `Invalid manifest${where}:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ManifestError';
  }
}
