/**
 * Manual script: runs one assessment against a live domain.
 *
 * Optional environment:
 *   - ANTHROPIC_API_KEY enables the narrative analysis pass
 *   - FIRECRAWL_API_KEY enables site mapping during discovery
 *
 * Run:
 *   npx tsx --env-file=.env.local run-assessment.ts acme.com
 */

import { assessVendor } from "./src/index";

const TARGET = process.argv[2] ?? "example.com";

async function main(): Promise<void> {
  console.log(`\nAssessing vendor: ${TARGET}\n`);

  const result = await assessVendor(TARGET);

  console.log(`Vendor: ${result.vendor.name} (${result.vendor.domain})`);
  console.log(`   Overall score: ${result.overallScore} (${result.riskCategory})`);
  console.log(
    `   Components: security ${result.components.dataSecurity}, privacy ${result.components.privacy}, ` +
      `compliance ${result.components.compliance}, operational ${result.components.operational}`
  );
  console.log(`   Human review: ${result.requiresHumanReview ? "required" : "not required"}`);
  console.log(`   Documents: ${result.documents.length}, findings: ${result.findings.length}\n`);

  for (const doc of result.documents) {
    const status = doc.contentHash ? `${doc.byteLength} bytes` : "not retrieved";
    console.log(`[${doc.documentType}] ${doc.url} (${doc.method}, ${status})`);
  }

  if (result.keyRiskFactors.length > 0) {
    console.log("\nKey risk factors:");
    for (const factor of result.keyRiskFactors) console.log(`   - ${factor}`);
  }

  if (result.followUpActions.length > 0) {
    console.log("\nFollow-up actions:");
    for (const action of result.followUpActions) {
      console.log(`   [${action.priority}] ${action.subject} (due ${action.dueDate.slice(0, 10)})`);
    }
  }
  console.log();
}

main().catch((err: unknown) => {
  console.error("\nAssessment failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
