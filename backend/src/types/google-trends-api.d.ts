declare module 'google-trends-api' {
  interface InterestOverTimeOptions {
    keyword: string | string[];
    startTime?: Date;
    endTime?: Date;
    geo?: string;
    hl?: string;
    timezone?: number;
    category?: number;
  }

  interface GoogleTrends {
    /** Resolves to the raw JSON body returned by Google Trends. */
    interestOverTime(options: InterestOverTimeOptions): Promise<string>;
  }

  const googleTrends: GoogleTrends;
  export default googleTrends;
}
