#!/usr/bin/env node
import { runMain } from "citty";
import { config } from "dotenv";
import { main } from "./commands/index.js";

// BUILDLOG_* settings may live in a .env in the working directory
config();

void runMain(main);
