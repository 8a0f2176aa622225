import type { StructuredToolInterface } from '@langchain/core/tools';
import { getStockFundamentals, getStockPrice } from './market/stock-data.js';
import { getCompanyInfo, getCompanyNews } from './market/company-info.js';
import { compareStocksTool } from './market/comparison.js';
import { plotMultipleStocksTool, plotStockPriceTool, plotVolumeTool } from './market/visualization.js';
import {
  COMPANY_INFO_DESCRIPTION,
  COMPANY_NEWS_DESCRIPTION,
  COMPARE_STOCKS_DESCRIPTION,
  PLOT_MULTIPLE_STOCKS_DESCRIPTION,
  PLOT_STOCK_PRICE_DESCRIPTION,
  PLOT_VOLUME_DESCRIPTION,
  STOCK_FUNDAMENTALS_DESCRIPTION,
  STOCK_PRICE_DESCRIPTION,
} from './descriptions/market.js';
import { parseToolResult, errorResult, type ToolResult } from './types.js';
import { errorMessage } from '../utils/errors.js';
import { logDebug } from '../utils/logger.js';

/**
 * A registered tool with its rich description for system prompt injection.
 */
export interface RegisteredTool {
  /** Tool name (must match the tool's name property) */
  name: string;
  /** The actual tool instance */
  tool: StructuredToolInterface;
  /** Rich description for system prompt (includes when to use, when not to use, etc.) */
  description: string;
}

/**
 * Get all registered tools with their descriptions.
 */
export function getToolRegistry(): RegisteredTool[] {
  return [
    { name: 'get_stock_price', tool: getStockPrice, description: STOCK_PRICE_DESCRIPTION },
    { name: 'get_stock_fundamentals', tool: getStockFundamentals, description: STOCK_FUNDAMENTALS_DESCRIPTION },
    { name: 'get_company_info', tool: getCompanyInfo, description: COMPANY_INFO_DESCRIPTION },
    { name: 'get_company_news', tool: getCompanyNews, description: COMPANY_NEWS_DESCRIPTION },
    { name: 'compare_stocks', tool: compareStocksTool, description: COMPARE_STOCKS_DESCRIPTION },
    // Visualization
    { name: 'plot_stock_price', tool: plotStockPriceTool, description: PLOT_STOCK_PRICE_DESCRIPTION },
    { name: 'plot_multiple_stocks', tool: plotMultipleStocksTool, description: PLOT_MULTIPLE_STOCKS_DESCRIPTION },
    { name: 'plot_volume', tool: plotVolumeTool, description: PLOT_VOLUME_DESCRIPTION },
  ];
}

/**
 * Get just the tool instances for binding to the LLM.
 */
export function getTools(): StructuredToolInterface[] {
  return getToolRegistry().map((t) => t.tool);
}

export function getRegisteredTool(name: string): RegisteredTool | undefined {
  return getToolRegistry().find((t) => t.name === name);
}

/**
 * Build the tool descriptions section for the system prompt.
 * Formats each tool's rich description with a header.
 */
export function buildToolDescriptions(): string {
  return getToolRegistry()
    .map((t) => `### ${t.name}\n\n${t.description.trim()}`)
    .join('\n\n');
}

/**
 * Invoke a tool by name outside the agent loop (HTTP and MCP surfaces).
 * Argument validation failures and unknown names come back as error results.
 */
export async function callRegisteredTool(name: string, args: Record<string, unknown>): Promise<ToolResult> {
  const registered = getRegisteredTool(name);
  if (!registered) {
    return errorResult('invalid_input', `Tool '${name}' not found`);
  }
  logDebug(`[Registry] calling ${name}`, args);
  try {
    const raw: unknown = await registered.tool.invoke(args);
    return parseToolResult(raw);
  } catch (error) {
    return errorResult('invalid_input', `Invalid arguments for ${name}: ${errorMessage(error)}`);
  }
}
