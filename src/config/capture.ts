// Screen-grab source selection per platform, with env overrides.
export type CaptureSource = {
  // ffmpeg demuxer passed to -f.
  format: string;
  // Device identifier passed to -i.
  input: string;
  // Extra args the demuxer needs right after the input.
  postInputArgs: string[];
};

type CaptureEnv = Record<string, string | undefined>;

const FORMAT_OVERRIDE = "REELCAP_CAPTURE_FORMAT";
const INPUT_OVERRIDE = "REELCAP_CAPTURE_INPUT";

const platformDefaults = (
  platform: NodeJS.Platform,
  env: CaptureEnv
): CaptureSource => {
  switch (platform) {
    case "win32":
      return { format: "gdigrab", input: "desktop", postInputArgs: [] };
    case "darwin":
      // Screen 1 without audio; avfoundation wants uyvy422 frames.
      return {
        format: "avfoundation",
        input: "1:none",
        postInputArgs: ["-pix_fmt", "uyvy422"]
      };
    default: {
      const display = env.DISPLAY?.trim();
      return {
        format: "x11grab",
        input: display ? display : ":0.0",
        postInputArgs: []
      };
    }
  }
};

export const resolveCaptureSource = (
  platform: NodeJS.Platform = process.platform,
  env: CaptureEnv = process.env
): CaptureSource => {
  const defaults = platformDefaults(platform, env);
  const format = env[FORMAT_OVERRIDE]?.trim();
  const input = env[INPUT_OVERRIDE]?.trim();
  if (format && format !== defaults.format) {
    // A different demuxer makes the platform-specific extras meaningless.
    return { format, input: input || defaults.input, postInputArgs: [] };
  }
  return {
    ...defaults,
    input: input || defaults.input
  };
};
