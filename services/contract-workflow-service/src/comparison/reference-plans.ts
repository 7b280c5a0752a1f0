import { promises as fs } from 'fs';
import { z } from 'zod';

export const referencePlanSchema = z.object({
  planId: z.string().min(1),
  name: z.string().min(1),
  insurer: z.string().min(1),
  planType: z.string().min(1),
  description: z.string().min(1),
  monthlyPremium: z.number().optional(),
  deductible: z.number().optional(),
});

export type ReferencePlan = z.infer<typeof referencePlanSchema>;

export function parseReferencePlans(json: unknown): ReferencePlan[] {
  const result = z.array(referencePlanSchema).safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const at = issue.path.length > 0 ? issue.path.join('.') : 'root';
    throw new Error(`Reference plans are malformed at ${at}: ${issue.message}`);
  }
  return result.data;
}

export async function readReferencePlans(file: string): Promise<ReferencePlan[]> {
  const raw = await fs.readFile(file, 'utf-8');
  return parseReferencePlans(JSON.parse(raw));
}

export const planEmbeddingText = (plan: ReferencePlan): string =>
  `${plan.name} (${plan.insurer}, ${plan.planType}): ${plan.description}`;

export function planMetadata(plan: ReferencePlan): Record<string, string> {
  const metadata: Record<string, string> = {
    planId: plan.planId,
    name: plan.name,
    insurer: plan.insurer,
    planType: plan.planType,
  };
  if (plan.monthlyPremium !== undefined) metadata.monthlyPremium = String(plan.monthlyPremium);
  if (plan.deductible !== undefined) metadata.deductible = String(plan.deductible);
  return metadata;
}
