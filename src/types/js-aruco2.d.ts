declare module "js-aruco2" {
  namespace aruco {
    interface ArucoPoint {
      x: number;
      y: number;
    }

    interface ArucoMarker {
      id: number;
      corners: ArucoPoint[];
    }

    interface ArucoImage {
      width: number;
      height: number;
      /** RGBA, 4 bytes per pixel. */
      data: Uint8ClampedArray | Uint8Array;
    }

    interface DetectorConfig {
      dictionaryName?: string;
      maxHammingDistance?: number;
    }

    class Detector {
      constructor(config?: DetectorConfig);
      detect(image: ArucoImage): ArucoMarker[];
    }

    class Dictionary {
      constructor(dictionaryName: string);
      generateSVG(id: number): string;
    }

    const AR: {
      Detector: typeof Detector;
      Dictionary: typeof Dictionary;
    };
  }

  export = aruco;
}

// Registers APRILTAG_36h11 with the detector's dictionary table.
declare module "js-aruco2/src/dictionaries/apriltag_36h11.js";
