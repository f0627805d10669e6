import chalk from "chalk";
import type { Address, CallNode } from "../evm/types";
import { optionalChalk } from "../utils/color";
import { labelCallPaths } from "./call-path";
import {
  formatContractName,
  formatErrorResult,
  formatFuncArgs,
  formatFuncName,
  formatFuncResult,
  isSuccess,
} from "./utils";

const TRACE_PREFIX = "│  ";
const BRANCH_PREFIX = "├─ ";
const END_PREFIX = "└─ ";

const createTreeString = (depth: number, prefix: string, content: string) => {
  return `${TRACE_PREFIX.repeat(depth)}${prefix}${content}\n`;
};

const traceTreeCallStart = (node: CallNode, labels: Map<Address, string> | undefined, colored = false) => {
  const fn = optionalChalk(isSuccess(node) ? chalk.green : chalk.red, colored);
  let str = `${fn(formatContractName(node.to, labels))}`;
  str += `::${fn(formatFuncName(node.input))}`;
  if (node.value) str += `{value:${node.value}}`;
  str += `(${optionalChalk(chalk.gray, colored)(formatFuncArgs(node.input))})`;
  str += optionalChalk(chalk.yellow, colored)(` [${node.kind}]`);
  return str;
};

const traceTreeCallResult = (node: CallNode, colored = false) => {
  const arrow = optionalChalk(isSuccess(node) ? chalk.green : chalk.red, colored)("←");
  return isSuccess(node)
    ? `${arrow} ${formatFuncResult(node.output)}`
    : `${arrow} ${formatErrorResult(node.status, node.output)}`;
};

export interface TraceTreeOptions {
  colored?: boolean;
  showPaths?: boolean;
  labels?: Map<Address, string>;
}

export const traceTree = (root: CallNode | undefined, options: TraceTreeOptions = { colored: true }) => {
  if (!root) return "";

  const paths = new Map(labelCallPaths(root).map(({ path, node }) => [node, path]));
  const pending: { node: CallNode; closing: boolean }[] = [{ node: root, closing: false }];
  let treeStr = "";

  for (let item = pending.pop(); item; item = pending.pop()) {
    const { node, closing } = item;
    if (closing) {
      treeStr += createTreeString(node.depth + 1, END_PREFIX, traceTreeCallResult(node, options.colored));
      continue;
    }

    let str = traceTreeCallStart(node, options.labels, options.colored);
    if (options.showPaths) str = `${optionalChalk(chalk.gray, options.colored)(`[${paths.get(node)}]`)} ${str}`;
    treeStr += createTreeString(node.depth, BRANCH_PREFIX, str);

    pending.push({ node, closing: true });
    for (let i = node.calls.length - 1; i >= 0; i--) pending.push({ node: node.calls[i], closing: false });
  }

  return treeStr;
};
