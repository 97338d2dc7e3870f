import type { ApiMetadataReader } from '../api-metadata.js';
import { removeLeadingColons } from '../inflector.js';
import type { PolicyStore } from '../policy.js';
import type { EngineName, FileContext, Reference } from '../types.js';

/**
 * Evaluates the layered access policy for one reference. Order matters:
 * overrides beat strong protection, and strong protection beats every
 * engine-declared exemption.
 */
export class AccessValidator {
  constructor(
    private policy: PolicyStore,
    private api: ApiMetadataReader,
  ) {}

  isValid(reference: Reference, ctx: FileContext, accessedEngine: EngineName): boolean {
    if (ctx.currentEngine === accessedEngine) return true;
    if (this.hasOverride(reference, ctx)) return true;

    if (this.policy.isStronglyProtected(ctx.currentEngine)) return false;
    if (this.policy.isStronglyProtected(accessedEngine)) return false;

    return (
      this.inLegacyDependent(ctx.path, accessedEngine) ||
      reference.throughApi ||
      this.isAllowlisted(reference, accessedEngine)
    );
  }

  private hasOverride(reference: Reference, ctx: FileContext): boolean {
    const allowed = this.policy.overridesFor(ctx.currentEngine);
    if (!allowed) return false;
    return reference.candidates.some(name => allowed.has(name));
  }

  // Substring match: entries are path fragments, not whole segments.
  private inLegacyDependent(filePath: string, engine: EngineName): boolean {
    return this.api.legacyDependents(engine).some(fragment => filePath.includes(fragment));
  }

  private isAllowlisted(reference: Reference, engine: EngineName): boolean {
    const allowlist = this.api.allowlist(engine);
    if (allowlist.length === 0) return false;
    return reference.candidates.some(name => allowlist.includes(removeLeadingColons(name)));
  }
}
