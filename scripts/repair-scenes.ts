/**
 * Scene configuration checker / repairer.
 *
 * Usage:
 *   npm run repair                                   # check $SCENES_CONFIG_PATH (default scenes.yaml)
 *   npm run repair -- path/to/scenes.yaml            # check a specific file
 *   npm run repair -- --fix duplicate_ids            # repair one defect class
 *   npm run repair -- --json                         # print issues as JSON
 *
 * Exit codes: 0 clean or repaired, 1 error, 2 unrepaired findings.
 */

import { resolve } from "node:path";
import { getConfig } from "../src/config/index.js";
import {
  buildRepairIssues,
  createRepairPipeline,
  isDefectClass,
  SceneDocumentStore,
  toErrorV1,
} from "../src/scenes/index.js";
import { log } from "../src/utils/telemetry.js";

const args = process.argv.slice(2);
const jsonFlag = args.includes("--json");
const fixIndex = args.indexOf("--fix");
const fixValue = fixIndex >= 0 ? args[fixIndex + 1] : undefined;
const positional = args.filter((a, i) => !a.startsWith("--") && !(fixIndex >= 0 && i === fixIndex + 1));

async function main(): Promise<number> {
  const config = getConfig();
  log.level = config.server.logLevel;
  const filePath = resolve(positional[0] ?? config.scenes.configPath);

  if (fixIndex >= 0) {
    if (!fixValue || !isDefectClass(fixValue)) {
      console.error(`Error: --fix expects duplicate_ids or empty_attributes, got '${fixValue ?? ""}'`);
      return 1;
    }

    const outcome = await createRepairPipeline().repair(filePath, fixValue);
    if (outcome.status === "done") {
      console.log(`No ${fixValue} issues in ${filePath}; nothing written.`);
    } else {
      console.log(`Repaired ${outcome.findings.length} ${fixValue} issue(s) in ${filePath}.`);
      console.log(`Backup: ${outcome.backup?.backupPath ?? "none"}`);
    }
    return 0;
  }

  const doc = await new SceneDocumentStore().load(filePath);
  const issues = buildRepairIssues(createRepairPipeline().detect(doc));

  if (jsonFlag) {
    console.log(JSON.stringify(issues, null, 2));
  } else if (issues.length === 0) {
    console.log(`${filePath}: no issues found.`);
  } else {
    for (const issue of issues) {
      const label = issue.severity === "error" ? "ERROR" : "WARN ";
      console.log(`${label}  ${issue.issue_id} (${issue.placeholders.scene_count} scenes)`);
      console.log(issue.placeholders.scene_list);
    }
    console.log(`\nRun with --fix <${issues.map((i) => i.defect_class).join("|")}> to repair.`);
  }

  return issues.length === 0 ? 0 : 2;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(JSON.stringify(toErrorV1(error), null, 2));
    process.exitCode = 1;
  },
);
