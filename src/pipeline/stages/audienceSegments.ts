import { createSeededRandom } from "../preprocess";
import type { AnalysisPost, AnalysisStage, Dataset, StageOutput } from "../types";
import { engagementOf, mean, round } from "./shared";

export const SEGMENT_FEATURES = ["likes", "comments", "shares", "saves", "impressions", "reach"] as const;
export type SegmentFeature = (typeof SEGMENT_FEATURES)[number];

const MIN_FEATURES = 2;
const MAX_ITERATIONS = 100;

type Matrix = number[][];

export type Clustering = {
  assignments: number[];
  inertia: number;
};

type ClusterPlan = {
  clusters: (posts: number) => number;
  restarts: number;
  scale: (matrix: Matrix) => Matrix;
  predictionType: string;
};

/** Features that vary across the dataset; a constant column cannot separate posts. */
export const informativeFeatures = (dataset: Dataset): SegmentFeature[] =>
  SEGMENT_FEATURES.filter((feature) => {
    const values = dataset.map((post) => post[feature]);
    return values.length > 1 && Math.min(...values) !== Math.max(...values);
  });

const columnsOf = (matrix: Matrix): number[][] =>
  (matrix[0] ?? []).map((_, column) => matrix.map((row) => row[column] ?? 0));

const mapColumns = (matrix: Matrix, transform: (values: number[]) => (value: number) => number): Matrix => {
  const transforms = columnsOf(matrix).map(transform);
  return matrix.map((row) => row.map((value, column) => transforms[column]?.(value) ?? value));
};

export const standardize = (matrix: Matrix): Matrix =>
  mapColumns(matrix, (values) => {
    const center = mean(values);
    const deviation = Math.sqrt(mean(values.map((value) => (value - center) ** 2)));
    return (value) => (deviation === 0 ? 0 : (value - center) / deviation);
  });

export const minMaxScale = (matrix: Matrix): Matrix =>
  mapColumns(matrix, (values) => {
    const low = Math.min(...values);
    const span = Math.max(...values) - low;
    return (value) => (span === 0 ? 0 : (value - low) / span);
  });

const squaredDistance = (a: readonly number[], b: readonly number[]): number =>
  a.reduce((total, value, index) => total + (value - (b[index] ?? 0)) ** 2, 0);

const nearest = (point: readonly number[], centroids: Matrix): { index: number; distance: number } =>
  centroids.reduce(
    (best, centroid, index) => {
      const distance = squaredDistance(point, centroid);
      return distance < best.distance ? { index, distance } : best;
    },
    { index: 0, distance: Number.POSITIVE_INFINITY }
  );

/** k-means++ seeding: each next centroid is drawn with probability proportional to squared distance. */
const seedCentroids = (points: Matrix, k: number, random: () => number): Matrix => {
  const first = points[Math.floor(random() * points.length)] ?? [];
  const centroids: Matrix = [[...first]];

  while (centroids.length < k) {
    const distances = points.map((point) => nearest(point, centroids).distance);
    const total = distances.reduce((sum, distance) => sum + distance, 0);
    const target = random() * total;

    let cumulative = 0;
    let picked = distances.findIndex((distance) => {
      cumulative += distance;
      return distance > 0 && cumulative > target;
    });
    if (picked < 0) picked = distances.findIndex((distance) => distance > 0);
    centroids.push([...(points[picked] ?? first)]);
  }

  return centroids;
};

const lloyd = (points: Matrix, initial: Matrix): Clustering => {
  const centroids = initial.map((centroid) => [...centroid]);
  let assignments = points.map(() => -1);

  for (let iteration = 0; iteration < MAX_ITERATIONS; iteration += 1) {
    const next = points.map((point) => nearest(point, centroids).index);
    const changed = next.some((cluster, index) => cluster !== assignments[index]);
    assignments = next;
    if (!changed) break;

    centroids.forEach((centroid, cluster) => {
      const members = points.filter((_, index) => assignments[index] === cluster);
      // An emptied cluster keeps its previous centroid.
      if (members.length === 0) return;
      centroid.forEach((_, column) => {
        centroid[column] = mean(members.map((member) => member[column] ?? 0));
      });
    });
  }

  const inertia = points.reduce((total, point, index) => {
    const centroid = centroids[assignments[index] ?? 0] ?? [];
    return total + squaredDistance(point, centroid);
  }, 0);
  return { assignments, inertia };
};

/**
 * Best of `restarts` seeded k-means runs by inertia. Throws when the data
 * holds fewer distinct points than the requested cluster count.
 */
export const kMeans = (points: Matrix, k: number, options: { seed: number; restarts: number }): Clustering => {
  const distinct = new Set(points.map((point) => point.join("|"))).size;
  if (distinct < k) {
    throw new Error(`only ${distinct} distinct post(s) for ${k} segments`);
  }

  const random = createSeededRandom(options.seed);
  let best: Clustering | null = null;
  for (let restart = 0; restart < options.restarts; restart += 1) {
    const candidate = lloyd(points, seedCentroids(points, k, random));
    if (!best || candidate.inertia < best.inertia) best = candidate;
  }
  if (!best) throw new Error("k-means needs at least one restart");
  return best;
};

const describeSegments = (dataset: Dataset, assignments: readonly number[]) => {
  const groups = new Map<number, AnalysisPost[]>();
  dataset.forEach((post, index) => {
    const cluster = assignments[index] ?? 0;
    groups.set(cluster, [...(groups.get(cluster) ?? []), post]);
  });

  return [...groups.values()]
    .map((members) => ({
      size: members.length,
      meanEngagement: round(mean(members.map(engagementOf))),
      centroid: Object.fromEntries(
        SEGMENT_FEATURES.map((feature) => [feature, round(mean(members.map((post) => post[feature])))])
      )
    }))
    .sort((a, b) => a.meanEngagement - b.meanEngagement || b.size - a.size)
    .map((segment, index) => ({
      segment: index,
      size: segment.size,
      share: round(segment.size / dataset.length, 4),
      mean_engagement: segment.meanEngagement,
      centroid: segment.centroid
    }));
};

type AudienceSegmentsOptions = { seed: number };

export const createAudienceSegmentsStage = (options: AudienceSegmentsOptions): AnalysisStage => {
  const segment = async (dataset: Dataset, plan: ClusterPlan): Promise<StageOutput> => {
    const features = informativeFeatures(dataset);
    const matrix = plan.scale(dataset.map((post) => features.map((feature) => post[feature])));
    const k = Math.min(plan.clusters(dataset.length), dataset.length);
    const clustering = kMeans(matrix, k, { seed: options.seed, restarts: plan.restarts });
    const segments = describeSegments(dataset, clustering.assignments);

    return {
      status: "completed",
      metrics: {
        clusters_found: segments.length,
        posts_clustered: dataset.length,
        features,
        inertia: round(clustering.inertia, 4)
      },
      predictions: [{ predictionType: plan.predictionType, payload: { n_clusters: segments.length, segments } }]
    };
  };

  return {
    name: "audience_segments",
    description: "Groups posts into engagement segments with k-means over the numeric metrics",
    precondition: (dataset) =>
      informativeFeatures(dataset).length >= MIN_FEATURES
        ? { ok: true }
        : { ok: false, reason: "insufficient numeric features for clustering" },
    run: (dataset) =>
      segment(dataset, {
        clusters: (posts) => Math.min(5, Math.max(2, Math.floor(posts / 10))),
        restarts: 10,
        scale: standardize,
        predictionType: "audience_segments"
      }),
    // Fewer clusters on min-max scaled values.
    fallback: (dataset) =>
      segment(dataset, {
        clusters: (posts) => Math.min(3, Math.max(2, Math.floor(posts / 20))),
        restarts: 5,
        scale: minMaxScale,
        predictionType: "audience_segments_fallback"
      })
  };
};
