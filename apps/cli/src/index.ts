#!/usr/bin/env -S node --import tsx
import { runMain } from "citty";
import { main } from "./commands/index.js";

runMain(main);
