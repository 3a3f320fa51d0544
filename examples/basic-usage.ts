/**
 * Tour of the seqtranslate API
 *
 * Run with `npm run example`.
 */

import {
  formatRegion,
  FrameScanner,
  getTranslationTable,
  listGeneticCodes,
  Translator,
} from "../src";

const SEQUENCE = "CTGATATCATGCATGCCATTCTCGACCGCTATGCGCCTCCTGTTCCTCGTGGGCCCAAAA";

// ============================================================================
// Example 1: Translating a sequence
// ============================================================================

function example1_translation(): void {
  console.log("\n=== Example 1: Translation ===\n");

  const translator = Translator.fromId(1);
  console.log(`  forward:          ${translator.translate(SEQUENCE)}`);
  console.log(`  forward, partial: ${translator.translate(SEQUENCE, { partial5: true })}`);
  console.log(`  reverse:          ${translator.translate(SEQUENCE, { strand: -1 })}`);

  const frames = translator.translateSixFrames(SEQUENCE);
  for (const [frame, protein] of Object.entries(frames)) {
    console.log(`  frame ${frame}: ${protein}`);
  }
}

// ============================================================================
// Example 2: Searching reading frames
// ============================================================================

function example2_readingFrames(): void {
  console.log("\n=== Example 2: Reading frames ===\n");

  const scanner = new FrameScanner();
  const orf = scanner.getORF(SEQUENCE);
  if (orf !== undefined) {
    console.log(`  longest ORF:        ${formatRegion(orf)}`);
  }

  for (const strict of [0, 1, 2] as const) {
    const cds = scanner.getCDS(SEQUENCE, { strict });
    console.log(`  CDS at strict ${strict}:  ${cds === undefined ? "none" : formatRegion(cds)}`);
  }

  console.log(`  stop-free frames:   ${scanner.nonstop(SEQUENCE).join(", ")}`);
  console.log(`  start codons:       ${scanner.find(SEQUENCE, "start").join(", ")}`);
}

// ============================================================================
// Example 3: Translating a CDS end to end
// ============================================================================

function example3_cdsProtein(): void {
  console.log("\n=== Example 3: CDS protein ===\n");

  const translator = new Translator();
  const cds = translator.getCDS(SEQUENCE, { strict: 2 });
  if (cds === undefined) {
    console.log("  no complete CDS");
    return;
  }
  console.log(`  ${formatRegion(cds, { method: "53" })}  ${translator.translateRange(SEQUENCE, cds)}`);
}

// ============================================================================
// Example 4: Other genetic codes
// ============================================================================

function example4_geneticCodes(): void {
  console.log("\n=== Example 4: Genetic codes ===\n");

  for (const { id, name } of listGeneticCodes().slice(0, 5)) {
    const table = getTranslationTable(id);
    console.log(`  ${String(id).padStart(2)} ${name}: stops ${table.codons("*").join(" ")}`);
  }

  const mito = Translator.fromId(2);
  console.log(`\n  vertebrate mitochondrial: ${mito.translate(SEQUENCE)}`);
}

function main(): void {
  example1_translation();
  example2_readingFrames();
  example3_cdsProtein();
  example4_geneticCodes();
}

main();
