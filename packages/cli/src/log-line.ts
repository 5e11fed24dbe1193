export const logLine = (message: string): void => {
  console.log(message);
};
