#!/usr/bin/env node
import Pastel from "pastel";

const app = new Pastel({
  importMeta: import.meta,
  name: "agent-rules",
  description: "Install coding-convention rules into a project's .claude folder",
});

await app.run();
