import { readFile } from "node:fs/promises";
import { defineCommand } from "citty";
import { consola } from "consola";
import type { ValidationEngine } from "../engine.js";
import type { BatchValidationResult } from "../entities/batch-result.js";
import type { EngineConfig } from "../entities/engine-config.js";
import { createRuleSetCompiler } from "../use-cases/compile-rule-set.js";
import type { EngineConfigParser } from "../use-cases/parse-engine-config.js";
import type { DatasetParser } from "../use-cases/parse-dataset.js";
import type { RuleSetParser } from "../use-cases/parse-rule-set.js";

export interface ValidateConsoleOutput {
    log(message: string): void;
    warn(message: string): void;
}

export interface ValidateCommandDeps {
    readonly datasetParser: DatasetParser;
    readonly ruleSetParser: RuleSetParser;
    readonly configParser: EngineConfigParser;
    readonly createEngine: (config: EngineConfig) => ValidationEngine;
}

export interface ValidateCommandInput {
    readonly dataPath: string;
    readonly rulesPath: string;
    readonly configPath?: string | undefined;
}

export interface ValidateCommand {
    execute(
        input: ValidateCommandInput,
        console: ValidateConsoleOutput,
    ): Promise<BatchValidationResult>;
}

export function createValidateCommand(
    deps: ValidateCommandDeps,
): ValidateCommand {
    return {
        async execute(
            input: ValidateCommandInput,
            output: ValidateConsoleOutput,
        ): Promise<BatchValidationResult> {
            const config = deps.configParser.parse(
                input.configPath
                    ? await readFile(input.configPath, "utf-8")
                    : "{}",
            );
            const engine = deps.createEngine(config);

            const ruleSet = deps.ruleSetParser.parse(
                await readFile(input.rulesPath, "utf-8"),
            );
            const rules = createRuleSetCompiler(engine.rules).compile(ruleSet);
            const rows = deps.datasetParser.parse(
                await readFile(input.dataPath, "utf-8"),
            );

            const result = await engine.rows.validateRows(rows, rules, {
                skipEmptyRows: true,
            });

            output.log(JSON.stringify(result, null, 2));

            if (!result.valid) {
                output.warn(
                    `Validation found ${result.error_count} error(s) and ${result.warning_count} warning(s) in ${result.invalid_rows} row(s)`,
                );
            }

            return result;
        },
    };
}

export function createValidateCittyCommand(deps: ValidateCommandDeps) {
    const validateCommand = createValidateCommand(deps);

    return defineCommand({
        meta: {
            name: "validate",
            description:
                "Validate every row of a JSON dataset against a JSON rule set",
        },
        args: {
            data: {
                type: "string",
                description: "Path to the dataset JSON file (array of rows)",
                required: true,
            },
            rules: {
                type: "string",
                description: "Path to the rule set JSON file",
                required: true,
            },
            config: {
                type: "string",
                description: "Path to an engine configuration JSON file",
            },
        },
        async run({ args }) {
            await validateCommand.execute(
                {
                    dataPath: args.data,
                    rulesPath: args.rules,
                    configPath: args.config,
                },
                {
                    log: (msg) => consola.log(msg),
                    warn: (msg) => consola.warn(msg),
                },
            );
        },
    });
}
