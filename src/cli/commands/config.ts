/**
 * Config command - Show settings file location
 */

import { getUserConfigPath } from "../../utils";

export function configCommand(): void {
  const configPath = getUserConfigPath();
  console.log("User settings file location:");
  console.log(configPath);
  console.log("\nCreate this file to override container images, runtime or defaults.");
  console.log("See src/config/default.json for available options.");
}
