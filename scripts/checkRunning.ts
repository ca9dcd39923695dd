import inquirer from "inquirer";
import {
  BENCHMARK_TARGETS,
  type Endpoint,
  formatEndpoint,
  isPortOpen,
  loadHarnessSettings
} from "../util";

/**
 * Endpoints a run will bind or expect, paired with a description.
 */
function watchedEndpoints(): [string, Endpoint][] {
  const settings = loadHarnessSettings(process.env.HARNESS_CONFIG || undefined);
  return [
    ["client proxy", settings.client.proxy],
    ...Object.entries(BENCHMARK_TARGETS).map(
      ([name, endpoint]): [string, Endpoint] => [`reference peer "${name}"`, endpoint]
    )
  ];
}

async function main() {
  const busy: string[] = [];
  for (const [description, endpoint] of watchedEndpoints()) {
    if (await isPortOpen(endpoint)) {
      busy.push(`${description} on ${formatEndpoint(endpoint)}`);
    }
  }

  if (busy.length === 0) {
    console.log("ℹ️ No test network is running on this machine, continuing...");
    return;
  }

  const { proceed } = await inquirer.prompt<{ proceed: boolean }>({
    type: "confirm",
    name: "proceed",
    default: false,
    message: `⚠️ Something is already listening on this machine:\n   ${busy.join("\n   ")}\n Are you sure you would like to proceed (may give inconsistent results)?`
  });

  if (!proceed) {
    process.exit(2);
  }
}

await main();
