export type RawImport = {
  columns: string[];
  rows: string[][];
};

export const FORMAT_VARIANTS = ["instagram_post_export", "facebook_video_export", "standard", "unknown"] as const;
export type FormatVariant = (typeof FORMAT_VARIANTS)[number];
export type KnownFormatVariant = Exclude<FormatVariant, "unknown">;

export const MEDIA_TYPES = ["Image", "Video", "Carousel"] as const;
export type MediaType = (typeof MEDIA_TYPES)[number];

export type CanonicalPost = Readonly<{
  postId: string;
  timestamp: Date;
  caption: string;
  likes: number;
  comments: number;
  shares: number;
  saves: number;
  impressions: number;
  reach: number;
  followerCount: number;
  audienceGender: string;
  audienceAge: string;
  location: string;
  hashtags: string;
  mediaType: MediaType;
}>;

export type AdaptResult = {
  posts: CanonicalPost[];
  rowsTotal: number;
  rowsSkipped: number;
};
