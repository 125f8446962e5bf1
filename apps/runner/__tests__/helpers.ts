import { createRunnerApp } from "../src/app.js";

export function memorySink() {
  const chunks: string[] = [];
  return {
    write: (chunk: string) => {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(""),
  };
}

export function testRunner() {
  const output = memorySink();
  const app = createRunnerApp({ output, programPath: "/usr/local/bin/flagroute" });
  return { app, output };
}
