import { checkConfig } from "@/lib/config";

export function register() {
  const problem = checkConfig();
  if (problem) {
    console.error(`❌ ${problem.message}`);
  } else {
    console.log("✅ Configuration loaded.");
  }
}
