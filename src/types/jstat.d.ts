// Type declarations for the parts of jstat used here; the package ships none

declare module 'jstat' {
  export interface jStat {
    binomial: {
      pdf(k: number, n: number, p: number): number;
    };

    combination(n: number, m: number): number;
    gammaln(x: number): number;
  }

  const jStat: jStat;
  export default jStat;
}
