const ARTIFACT_ID_GLOBAL = /[a-f0-9]{64}/g;

/** Non-identifier text a strict response may carry, after whitespace is collapsed */
export const MAX_STRICT_TEXT_LENGTH = 50;

/**
 * Strict mode: responses surfaced to collaborators must cite artifact ids and
 * carry almost nothing else.
 */
export class StrictMode {
  constructor(public readonly enabled: boolean = true) {}

  validateResponse(response: string): boolean {
    if (!this.enabled) return true;

    if (this.extractArtifactIds(response).length === 0) return false;

    const remainder = response.replace(ARTIFACT_ID_GLOBAL, '').replace(/\s+/g, ' ').trim();
    return remainder.length <= MAX_STRICT_TEXT_LENGTH;
  }

  extractArtifactIds(text: string): string[] {
    return text.match(ARTIFACT_ID_GLOBAL) ?? [];
  }

  formatArtifactResponse(artifactIds: string[], context?: string): string {
    if (!artifactIds.length) return 'No artifacts';

    const lines: string[] = [];
    if (context) lines.push(context);
    lines.push('Artifacts:');
    for (const id of artifactIds) {
      lines.push(`  ${id}`);
    }
    return lines.join('\n');
  }
}
