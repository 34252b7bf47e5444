export const LOW_FLOAT_SCREEN_DESCRIPTION = `Screen every NASDAQ- and other-listed US symbol for a low float (tradable share count).

Use to build a universe of thinly traded names before deeper research.
This tool does NOT score or value companies.

Inputs:
- cutoff: inclusive float ceiling (default 10,000,000)
- eligibility: keep only symbols the brokerage lists as instruments (default false)
- limit: process only the first N symbols in sorted order (0 = all)
- workers: parallel float lookups (default 8)
- output: CSV path (default under .lowfloat/outputs)

Symbols whose float cannot be determined are dropped, never reported as zero.
Returns run counts, the CSV path and the 25 lowest-float rows.`;
