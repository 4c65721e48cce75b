import util from "util";

// stdout carries the MCP stdio transport; stray console output there corrupts the stream.
const ALLOW_STDOUT_LOGS = process.env.SOLUTION_MAP_ALLOW_STDOUT_LOGS === "true";
const DEBUG_LOGS_ENABLED = process.env.SOLUTION_MAP_DEBUG === "true"
    || (process.env.SOLUTION_MAP_LOG_LEVEL ?? "").toLowerCase() === "debug";

if (!ALLOW_STDOUT_LOGS) {
    const redirect = (level: "info" | "debug") => (...args: unknown[]) => {
        if (level === "debug" && !DEBUG_LOGS_ENABLED) {
            return;
        }
        const line = util.format(...args) + "\n";
        process.stderr.write(line);
    };

    console.log = redirect("info");
    console.info = redirect("info");
    console.debug = redirect("debug");
}
