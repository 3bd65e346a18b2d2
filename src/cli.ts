#!/usr/bin/env node
import { createCli } from "./commands/index.js";

createCli().parse();
