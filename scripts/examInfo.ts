import "dotenv/config";
import { createInterface } from "node:readline/promises";
import { parseArgs } from "node:util";
import { renderExamInfoReport } from "@/lib/exam-info/report";
import { fetchExamInfo } from "@/lib/exam-info/service";
import { resolveSourcesRuntimeConfig, warnIfYoutubeKeyMissing } from "@/lib/sources/config";

async function promptForExam() {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question("Enter exam name (e.g., NEET, JEE Main, CLAT, UPSC, CUET, SSC CGL): ");
  } finally {
    rl.close();
  }
}

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      "no-videos": { type: "boolean", default: false },
      "no-books": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
    },
  });

  if (!values.json) console.log("Exam Info Fetcher (Wikipedia + YouTube + Google Books + Solved PYQs)");
  const query = (positionals.length ? positionals.join(" ") : await promptForExam()).trim();
  if (!query) {
    console.log("No query entered. Exiting.");
    return;
  }

  const config = resolveSourcesRuntimeConfig();
  const includeVideos = !values["no-videos"];
  if (includeVideos) warnIfYoutubeKeyMissing(config);

  const info = await fetchExamInfo(query, {
    includeVideos,
    includeBooks: !values["no-books"],
    config,
  });

  if (values.json) {
    console.log(JSON.stringify(info, null, 2));
    return;
  }
  console.log(`\n${renderExamInfoReport(info)}\n`);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
