import { runConsole } from "./console";

runConsole(process.stdin, process.stdout).catch((error: unknown) => {
  console.error("Console session failed", error);
  process.exitCode = 1;
});
