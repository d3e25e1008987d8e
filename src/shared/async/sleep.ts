export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = async (ms) => {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
};
