import pc from "picocolors";

export const logErrorLine = (message: string): void => {
  console.error(pc.red(message));
};
