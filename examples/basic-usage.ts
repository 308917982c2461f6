/**
 * Basic Usage Example
 *
 * Installs a model archive into a fresh repository, merges its persisted
 * parameters, resolves labels and builds a similarity index.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { join } from "node:path";
import { mkdir, rm } from "node:fs/promises";
import { openRepository, treeBackend, type ParameterSet } from "@modelrepo/sdk";
import { writeTarArchive } from "@modelrepo/testkit";

async function main() {
  // Setup: build a small model archive to install
  const workDir = "./examples-data/basic";
  await rm(workDir, { recursive: true, force: true });
  await mkdir(workDir, { recursive: true });

  const archive = await writeTarArchive(join(workDir, "classifier.tar.gz"), {
    "config.json": JSON.stringify({ parameters: { mllib: { nclasses: 3, gpu: false } } }),
    "corresp.txt": "0 cat\n1 dog\n2 bird\n",
    "best_model.txt": "iteration 4000\n",
  });

  // Open: validate → bootstrap → merge config.json into the outgoing set
  console.log("📂 Opening repository...");
  const outgoing: ParameterSet = { service: "classifier" };
  const repo = await openRepository(
    {
      repository: join(workDir, "model"),
      create_repository: true,
      init: archive,
      index_preload: true,
    },
    { outgoing, backend: treeBackend }
  );
  console.log(`✅ Installed ${repo.bootstrap?.archive} into ${repo.path}`);
  console.log(`   Parameters: ${JSON.stringify(outgoing.parameters)}`);
  console.log(`   Best model: ${await repo.readBestModel()}`);

  // Labels
  console.log("\n🏷️  Resolving labels...");
  await repo.loadCorrespondences(join(repo.path, "corresp.txt"));
  for (const index of [0, 2, 5]) {
    console.log(`   ${index} → ${repo.lookupLabel(index)}`);
  }

  // Similarity index
  console.log("\n🔎 Building similarity index...");
  await repo.createSimSearch(128);
  await repo.buildIndex();
  console.log(`✅ Built ${repo.similarity.backendKind} index`);

  await repo.close();
}

main().catch((err) => {
  console.error("Error:", err);
  process.exit(1);
});
