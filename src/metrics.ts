import prometheus from 'prom-client';

const metrics = {
  decodeDuration: new prometheus.Histogram({
    name: 'pdfpng_decode_duration_seconds',
    help: 'Latency for decoding a PNG image into an image descriptor',
    buckets: [0.001, 0.005, 0.015, 0.05, 0.1, 0.5, 1, 2],
    labelNames: ['status', 'color_type'],
  }),
  pageGenerationDuration: new prometheus.Histogram({
    name: 'pdfpng_page_generation_duration_seconds',
    help: 'Latency for generating the PDF for a single page',
    buckets: [0.001, 0.005, 0.015, 0.05, 0.1, 0.5, 1, 2],
    labelNames: ['status'],
  }),
};

export default metrics;
