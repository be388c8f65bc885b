import { describeCause } from "../entities/rule-outcome.js";
import type { EngineLogger } from "./engine-logger.port.js";

export interface DebouncedValidationDeps<R> {
    readonly run: (signal: AbortSignal) => Promise<R>;
    readonly onResult: (result: R, reason: string) => void;
    readonly logger: EngineLogger;
    readonly debounceMs: number;
}

export interface DebouncedValidation<R> {
    readonly pendingCount: number;
    schedule(reason: string): void;
    cancelPending(): void;
    validateNow(): Promise<R>;
    dispose(): void;
}

/**
 * Coalesces bursts of edit triggers into a single validation pass. Only one
 * pass runs at a time; a timer that fires while a pass is running is dropped.
 */
export function createDebouncedValidation<R>(
    deps: DebouncedValidationDeps<R>,
): DebouncedValidation<R> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    let pendingCount = 0;
    let running: Promise<unknown> | undefined;
    let controller: AbortController | undefined;
    let disposed = false;

    const runPass = (): Promise<R> => {
        controller = new AbortController();
        const pass = deps.run(controller.signal);
        const settled = pass.then(
            () => undefined,
            () => undefined,
        );
        running = settled;
        void settled.then(() => {
            if (running === settled) {
                running = undefined;
            }
        });
        return pass;
    };

    const fire = async (reason: string) => {
        timer = undefined;
        if (disposed) {
            return;
        }
        if (running) {
            deps.logger.debug(
                `Validation already running, skipping pass for ${reason}`,
            );
            return;
        }

        deps.logger.info(
            `Starting debounced validation for ${reason} (${pendingCount} trigger(s) coalesced)`,
        );
        pendingCount = 0;
        try {
            deps.onResult(await runPass(), reason);
        } catch (error) {
            deps.logger.warn(
                `Debounced validation failed for ${reason}: ${describeCause(error)}`,
            );
        }
    };

    const cancelPending = () => {
        clearTimeout(timer);
        timer = undefined;
        pendingCount = 0;
    };

    return {
        get pendingCount() {
            return pendingCount;
        },

        schedule(reason: string): void {
            if (disposed) {
                deps.logger.warn(
                    `Cannot schedule validation for ${reason}: debouncer is disposed`,
                );
                return;
            }
            clearTimeout(timer);
            pendingCount++;
            timer = setTimeout(() => {
                void fire(reason);
            }, deps.debounceMs);
        },

        cancelPending,

        async validateNow(): Promise<R> {
            if (disposed) {
                throw new Error("Debounced validation has been disposed");
            }
            cancelPending();
            // several callers may wake on the same settled pass; the first to resume claims the slot
            while (running) {
                await running;
            }
            if (disposed) {
                throw new Error("Debounced validation has been disposed");
            }
            return runPass();
        },

        dispose(): void {
            if (disposed) {
                return;
            }
            disposed = true;
            cancelPending();
            controller?.abort();
        },
    };
}
