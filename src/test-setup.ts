import chalk from "chalk";

// assertions compare plain text
chalk.level = 0;
