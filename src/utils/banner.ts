import pc from "picocolors";

const BANNER_ASCII = `
  ┬─┐┬ ┬┌┐┌┌┬┐┬┌┬┐┌─┐  ┌─┐┬ ┬┌─┐┌─┐┬┌─┌─┐┬─┐
  ├┬┘│ ││││ │ ││││├┤   │  ├─┤├┤ │  ├┴┐├┤ ├┬┘
  ┴└─└─┘┘└┘ ┴ ┴┴ ┴└─┘  └─┘┴ ┴└─┘└─┘┴ ┴└─┘┴└─
`;

export function showBanner(): void {
  console.log(pc.yellow(BANNER_ASCII));
  console.log(pc.cyan("  ⏱  Wall-clock timing for Python, Java, C and C++ sources"));
  console.log(pc.dim("  Runtime is best-effort and can change between runs\n"));
}
