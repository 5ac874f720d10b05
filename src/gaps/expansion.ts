// src/gaps/expansion.ts
// Expanded-set selection: curated genes plus HGNC genes that sit in a matching
// gene group or carry a matching term in their approved name. Each kept gene
// gets a developmental role from the rule that kept it.

import { z } from "zod";
import { readJsonArtifact } from "../adapters/files.js";
import type { ExpandedGene, HgncGene } from "./types.js";
import { normalizeSymbol } from "./types.js";

export const ExpansionRules = z.object({
  groups: z.array(z.string()),
  name_terms: z.array(z.string()),
  // gene-group pattern -> role, matched case-insensitively as a substring
  group_roles: z.record(z.string()).optional(),
  name_term_roles: z.record(z.string()).optional(),
  default_name_term_role: z.string().optional(),
});

export type ExpansionRulesT = z.infer<typeof ExpansionRules>;

export async function loadExpansionRules(file: string): Promise<ExpansionRulesT> {
  const rules = await readJsonArtifact(file, "rules", ExpansionRules);
  if (!rules) throw new Error(`Expansion rules not available at ${file}`);
  return rules;
}

function matchGroup(gene: HgncGene, groupsLower: string[]): string | undefined {
  return gene.gene_group.find(group => {
    const g = group.toLowerCase();
    return groupsLower.some(cg => g.includes(cg));
  });
}

export const OTHER_ROLE = "other";

/** Role for a source tag. Curated genes keep the role the curated pipeline gives them, so none here. */
export function assignRole(source: string, rules: ExpansionRulesT): string {
  if (source === "curated") return "";
  if (source.startsWith("group:")) {
    const group = source.slice("group:".length).toLowerCase();
    const hit = Object.entries(rules.group_roles ?? {}).find(([pattern]) => group.includes(pattern.toLowerCase()));
    return hit ? hit[1] : OTHER_ROLE;
  }
  if (source.startsWith("name:")) {
    const term = source.slice("name:".length);
    const roles = rules.name_term_roles ?? {};
    if (Object.hasOwn(roles, term)) return roles[term];
    return rules.default_name_term_role ?? OTHER_ROLE;
  }
  return OTHER_ROLE;
}

/**
 * One entry per symbol, tagged with the reason it was kept:
 * "curated", "group:<gene group>" or "name:<term>". Order follows the input.
 */
export function selectExpandedGenes(
  genes: HgncGene[],
  curatedSymbols: Set<string>,
  rules: ExpansionRulesT
): ExpandedGene[] {
  const groupsLower = rules.groups.map(g => g.toLowerCase());
  const out: ExpandedGene[] = [];
  const seen = new Set<string>();

  for (const gene of genes) {
    const symbol = normalizeSymbol(gene.symbol);
    if (seen.has(symbol)) continue;

    let source: string | undefined;
    if (curatedSymbols.has(symbol)) {
      source = "curated";
    } else {
      const group = matchGroup(gene, groupsLower);
      if (group) {
        source = `group:${group}`;
      } else {
        const nameLower = gene.name.toLowerCase();
        const term = rules.name_terms.find(t => nameLower.includes(t));
        if (term) source = `name:${term}`;
      }
    }
    if (!source) continue;

    seen.add(symbol);
    out.push({ ...gene, symbol, source, role: assignRole(source, rules) });
  }
  return out;
}

/** Genes per role; curated genes, which carry no role here, are left out. */
export function roleStats(genes: Pick<ExpandedGene, "role">[]): Record<string, number> {
  const stats: Record<string, number> = {};
  for (const g of genes) {
    if (g.role) stats[g.role] = (stats[g.role] ?? 0) + 1;
  }
  return stats;
}

/** Count per tag kind: curated / group / name. */
export function expansionStats(genes: Pick<ExpandedGene, "source">[]): Record<string, number> {
  const stats: Record<string, number> = {};
  for (const g of genes) {
    const kind = g.source.split(":")[0] || "unknown";
    stats[kind] = (stats[kind] ?? 0) + 1;
  }
  return stats;
}
