import { defineCommand, runMain } from "citty";
import { consola } from "consola";
import { createValidateCittyCommand } from "./commands/validate.js";
import { createValidationEngine } from "./engine.js";
import { createLoggingPerformanceSink } from "./gateways/performance-sink.js";
import { createEngineConfigParser } from "./use-cases/parse-engine-config.js";
import { createDatasetParser } from "./use-cases/parse-dataset.js";
import { createRuleSetParser } from "./use-cases/parse-rule-set.js";

const logger = consola.withTag("gridcheck");

const validate = createValidateCittyCommand({
    datasetParser: createDatasetParser(),
    ruleSetParser: createRuleSetParser(),
    configParser: createEngineConfigParser(),
    createEngine: (config) =>
        createValidationEngine(config, {
            logger,
            sink: createLoggingPerformanceSink(logger),
        }),
});

const main = defineCommand({
    meta: {
        name: "gridcheck",
        description:
            "Run data-grid validation rules with per-rule timeouts and aggregated verdicts",
    },
    subCommands: {
        validate,
    },
});

runMain(main);
