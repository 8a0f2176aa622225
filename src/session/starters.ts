export interface Starter {
  label: string;
  message: string;
}

export const STARTERS: readonly Starter[] = [
  { label: "Analyze Apple's Fundamentals", message: "Analyze Apple's stock fundamentals including P/E ratio, profit margins, and growth metrics" },
  { label: 'Compare Tech Giants', message: 'Compare AAPL, MSFT, and GOOGL performance over the last year with a chart' },
  { label: 'Latest Tesla News', message: "What's the latest news about Tesla (TSLA)?" },
  { label: 'Get NVIDIA Price', message: "What is NVIDIA's current stock price?" },
  { label: 'Tesla Price Chart', message: "Show me Tesla's stock price chart for the last 6 months" },
  { label: 'Company Info', message: 'Tell me about Microsoft - what sector are they in and what do they do?' },
  { label: 'Volume Analysis', message: 'Show me the trading volume for AMD over the past 3 months' },
  { label: 'Compare Semiconductors', message: 'Compare the fundamentals of NVDA and AMD side by side' },
];

export const WELCOME_MESSAGE = `Financial Analysis Agent

I can help you with:

- Real-time stock data: current prices, market cap and key metrics
- Fundamental analysis: P/E ratios, profit margins, growth rates
- Company information: business overview, sector and industry
- News: latest articles about a company
- Stock comparisons: side-by-side metrics for several tickers
- Charts: price, performance comparison and volume

Disclaimer: for educational purposes only, not financial advice.`;
