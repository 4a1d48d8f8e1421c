import { main } from "./cli";

process.exitCode = main();
