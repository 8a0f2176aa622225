export const STOCK_PRICE_DESCRIPTION = `
Get the current price, daily change, market cap and 52-week range of a stock.
Requires 'ticker' (e.g., AAPL). Use for "what is X trading at" questions.
`;

export const STOCK_FUNDAMENTALS_DESCRIPTION = `
Get valuation ratios (P/E, forward P/E, PEG, P/B, P/S), profitability, growth, financial health and analyst targets.
Requires 'ticker'. Use for "is X overvalued", "fundamentals of X" questions.
`;

export const COMPANY_INFO_DESCRIPTION = `
Get the company profile: name, sector, industry, country, employees, business summary and website.
Requires 'ticker'.
`;

export const COMPANY_NEWS_DESCRIPTION = `
Get the 5 most recent news headlines about a company, with dates and sources.
Requires 'ticker'.
`;

export const COMPARE_STOCKS_DESCRIPTION = `
Compare price, market cap, P/E, profit margin, revenue growth and ROE of 2 or more stocks in a table.
Requires 'tickers' (list). For a visual comparison of returns use 'plot_multiple_stocks' instead.
`;

export const PLOT_STOCK_PRICE_DESCRIPTION = `
Create a candlestick price chart for one stock. Use when the user wants to see, show, plot or chart a price.
Requires 'ticker'; optional 'period' (default 6mo).
`;

export const PLOT_MULTIPLE_STOCKS_DESCRIPTION = `
Create a chart of percentage returns for 2 or more stocks over the same period.
Use when the user wants to compare performance visually. Requires 'tickers'; optional 'period' (default 6mo).
`;

export const PLOT_VOLUME_DESCRIPTION = `
Create a daily trading volume chart (red bars on down days, green on up days).
Requires 'ticker'; optional 'period' (default 3mo).
`;
