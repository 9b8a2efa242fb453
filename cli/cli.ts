#!/usr/bin/env -S node --import tsx

/**
 * polyfit CLI
 *
 * Runs restart hillclimbing against a reference shape or a PNG target and
 * reports what it found. Uses the same modules as the tests.
 */

import type { SearchConfig } from "../src/config.ts";
import { loadTargetPng, writeRasterPng } from "../src/formats/png.ts";
import { inkCoverage } from "../src/raster/ink.ts";
import { showSideBySide } from "../src/render/display.ts";
import { createNapiCanvasBackend } from "../src/render/napi_canvas.ts";
import { formatCandidate } from "../src/search/candidate.ts";
import { hillclimb } from "../src/search/hillclimb.ts";
import { parallelSearch } from "../src/search/parallel.ts";
import { findSolution, findSolutionSeeded, findSolutionWith, type RestartResult } from "../src/search/restart.ts";
import { createSession, type SearchSession, type TargetSource } from "../src/search/session.ts";
import { getShape } from "../src/search/shapes.ts";
import { formatSummary, histogram, summarize, timeRun } from "../src/stats/timing.ts";
import { checkStartLength, type CliOptions, parseCliArgs, USAGE } from "./options.ts";

async function buildSession(options: CliOptions): Promise<SearchSession> {
    const config: Partial<SearchConfig> = { boundary: options.boundary };
    let target: TargetSource;

    if (options.input) {
        console.log(`Loading PNG: ${options.input}`);
        const start = performance.now();
        const raster = await loadTargetPng(options.input);
        console.log(`Loaded: ${raster.width}x${raster.height} pixels (${(performance.now() - start).toFixed(1)}ms)`);
        target = { kind: "raster", raster };
    } else {
        const shape = getShape(options.shape);
        config.width = shape.width;
        config.height = shape.height;
        config.pointCount = shape.polygon.length;
        target = { kind: "polygon", polygon: shape.polygon };
        console.log(`Target: ${shape.name} ${formatCandidate(shape.polygon)}`);
    }
    if (options.points !== undefined) config.pointCount = options.points;

    const session = createSession({ backend: createNapiCanvasBackend(), target, config });
    console.log(
        `Grid ${session.config.width}x${session.config.height}, K=${session.config.pointCount}, ` +
            `ink coverage ${(inkCoverage(session.target) * 100).toFixed(1)}%`,
    );
    return session;
}

async function report(session: SearchSession, result: RestartResult, options: CliOptions): Promise<void> {
    const status = result.found ? "Exact fit" : "No exact fit";
    console.log(`\n${status}: ${formatCandidate(result.candidate)}`);
    console.log(
        `  score ${result.score.toFixed(3)}, ${result.trials} trials, ` +
            `${result.evaluations} evaluations, ${result.elapsedMs.toFixed(1)}ms`,
    );

    const rendered = session.rasterizer.render(result.candidate);
    console.log("\n  target" + " ".repeat(session.config.width * 2 - 3) + "best");
    for (const line of showSideBySide(session.target, rendered)) {
        console.log(`  ${line}`);
    }

    if (options.output) {
        await writeRasterPng(rendered, options.output);
        console.log(`\nSaved ${options.output}`);
    }
}

async function runFit(options: CliOptions): Promise<void> {
    const session = await buildSession(options);
    console.log(`Strategy: ${options.strategy}, workers: ${options.workers}`);

    let result: RestartResult;
    if (options.workers > 1) {
        result = await parallelSearch({
            target: session.target,
            config: session.config,
            strategy: options.strategy,
            workers: options.workers,
            seed: options.seed,
            maxTrialsPerWorker: options.maxTrials,
            deadlineMs: options.deadlineMs,
        });
    } else {
        result = findSolutionWith(session, options.strategy, {
            seed: options.seed,
            maxTrials: options.maxTrials,
            deadlineMs: options.deadlineMs,
            onTrial: options.verbose
                ? ({ trial, result: climb }) =>
                    console.log(
                        `  trial ${trial}: score ${climb.score.toFixed(3)} after ${climb.steps} steps`,
                    )
                : undefined,
        });
    }

    await report(session, result, options);
    if (!result.found) process.exitCode = 2;
}

async function runClimb(options: CliOptions): Promise<void> {
    if (!options.start) throw new Error("climb needs --start");
    const session = await buildSession(options);
    const start = checkStartLength(options.start, session.config.pointCount);

    const evaluator = session.createEvaluator();
    const { result, elapsedMs } = timeRun(() =>
        hillclimb(start, evaluator, {
            boundary: session.config.boundary,
            width: session.config.width,
            height: session.config.height,
            onStep: options.verbose
                ? (candidate, score, step) =>
                    console.log(`  step ${step}: ${formatCandidate(candidate)} score ${score.toFixed(3)}`)
                : undefined,
        })
    );

    console.log(`Start ${formatCandidate(start)} score ${result.trace[0].toFixed(3)}`);
    await report(session, {
        found: result.score === 0,
        candidate: result.candidate,
        score: result.score,
        trials: 1,
        evaluations: evaluator.evaluations,
        elapsedMs,
    }, options);
}

async function runBench(options: CliOptions): Promise<void> {
    const session = await buildSession(options);
    const strategies = [
        { label: "baseline (uniform)", run: findSolution },
        { label: "seeded (ink hull)", run: findSolutionSeeded },
    ];
    const means: number[] = [];

    for (const { label, run } of strategies) {
        console.log(`\n=== ${label.toUpperCase()} ===`);
        const times: number[] = [];
        const trials: number[] = [];
        for (let i = 0; i < options.runs; i++) {
            const seed = options.seed === undefined ? undefined : `${options.seed}:${i}`;
            const result = run(session, { seed, maxTrials: options.maxTrials, deadlineMs: options.deadlineMs });
            times.push(result.elapsedMs);
            trials.push(result.trials);
            console.log(
                `- run ${i + 1}: ${result.found ? "exact" : "gave up"} after ${result.trials} trials, ` +
                    `${result.evaluations} evaluations, ${result.elapsedMs.toFixed(1)}ms`,
            );
        }
        const summary = summarize(times);
        means.push(summary.mean);
        console.log(formatSummary("time", summary));
        console.log(formatSummary("trials", summarize(trials), ""));
        for (const bin of histogram(times, 4)) {
            console.log(`  ${bin.from.toFixed(0)}-${bin.to.toFixed(0)}ms ${"#".repeat(bin.count)}`);
        }
    }

    console.log(`\nSeeded / baseline mean time: ${((means[1] / means[0]) * 100).toFixed(1)}%`);
}

async function main(argv: string[]): Promise<void> {
    const options = parseCliArgs(argv);
    if (options.help) {
        console.log(USAGE);
        return;
    }

    switch (options.command) {
        case "fit":
            return runFit(options);
        case "climb":
            return runClimb(options);
        case "bench":
            return runBench(options);
    }
}

main(process.argv.slice(2)).catch((error: unknown) => {
    console.error("Error:", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
