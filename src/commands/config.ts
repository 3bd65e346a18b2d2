import * as clack from "@clack/prompts";
import chalk from "chalk";
import { ConfigService, maskApiKey } from "../core/config-service.js";
import { resolveSections, sectionIds } from "../core/sections.js";
import { ReadmeError } from "../errors.js";
import { makeModelSelection, makeSectionSelection } from "./helpers.js";

export interface ConfigFlags {
  setApiKey?: string;
  getApiKey: boolean;
  setSections: string[];
  getSections: boolean;
}

export async function configCommand(flags: ConfigFlags): Promise<void> {
  const config = await ConfigService.create();

  if (flags.setApiKey !== undefined) {
    const apiKey = flags.setApiKey.trim();
    if (!apiKey) throw new ReadmeError("API key cannot be empty");
    await config.save({ apiKey });
    clack.log.success(`API key saved for ${config.provider}`);
    return;
  }

  if (flags.getApiKey) {
    const apiKey = config.apiKey;
    if (apiKey) {
      clack.log.info(`Current API key: ${chalk.blue(maskApiKey(apiKey))}`);
    } else {
      clack.log.warn("No API key configured");
    }
    return;
  }

  if (flags.setSections.length > 0) {
    const { sections, unknown } = resolveSections(flags.setSections);
    if (unknown.length > 0) {
      clack.log.warn(`Ignoring unknown sections: ${unknown.join(", ")}`);
    }
    if (sections.length == 0) {
      throw new ReadmeError("No valid sections provided", 'Run "readmesmith sections" to list them.');
    }
    const ids = sectionIds(sections);
    await config.save({ defaultSections: ids });
    clack.log.success(`Default sections set: ${ids.join(", ")}`);
    return;
  }

  if (flags.getSections) {
    clack.log.info(`Default sections: ${config.defaultSections.join(", ")}`);
    return;
  }

  clack.intro(chalk.green.bold("readmesmith configuration"));
  const credentials = await makeModelSelection({
    provider: config.provider,
    model: config.model,
  });
  const sections = await makeSectionSelection(config.defaultSections);
  await config.save({ ...credentials, defaultSections: sectionIds(sections) });
  clack.outro(chalk.green(`Configuration saved to ${config.path}`));
}
