/**
 * Config command - Show configuration file location
 */

import { getUserConfigPath } from "../../utils/index.js";

export function configCommand(): void {
  const configPath = getUserConfigPath();
  console.log("User configuration file location:");
  console.log(configPath);
  console.log("\nCreate this file to change the default build settings.");
  console.log("See config/default.json for available options.");
}
