#!/usr/bin/env node
import { main } from "./main";

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("fx-sync crashed:", err);
    process.exitCode = 1;
  });
