import pc from "picocolors";

// Status lines for `formpost send`; failures go to stderr.

/** 2xx status line */
export const success = (msg: string) => console.log(pc.green(`  ✓ ${msg}`));

/** Progress line, e.g. what is about to be sent and where */
export const info = (msg: string) => console.log(pc.cyan(`  ${msg}`));

/** Bad options, encoding or transport failures, non-2xx status */
export const error = (msg: string) => console.error(pc.red(`  ✗ ${msg}`));

/** Follow-up suggestion printed under an error */
export const hint = (msg: string) => console.log(pc.dim(`    ${msg}`));
