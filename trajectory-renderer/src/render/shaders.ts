// Inputs that may arrive either per instance or as a uniform are switched by
// the INSTANCED_* defines. 2D positions feed a vec3 attribute; GL fills z with 0.

export const particleVertexShader = /* glsl */ `
#ifdef INSTANCED_POSITION
attribute vec3 particlePosition;
#else
uniform vec3 particlePosition;
#endif

#ifdef INSTANCED_SIZE
attribute float particleSize;
#else
uniform float particleSize;
#endif

#ifdef INSTANCED_COLOR
attribute vec3 particleColor;
#else
uniform vec3 particleColor;
#endif

#ifdef INSTANCED_ANGLE
attribute float particleAngle;
#else
uniform float particleAngle;
#endif

varying vec3 vColor;
#ifdef LIT
varying vec3 vNormal;
#endif

void main() {
  vec3 local = position * particleSize;
  float c = cos(particleAngle);
  float s = sin(particleAngle);
  local.xy = mat2(c, s, -s, c) * local.xy;
  vColor = particleColor;
#ifdef LIT
  vNormal = normalize(normalMatrix * normal);
#endif
  gl_Position = projectionMatrix * modelViewMatrix * vec4(particlePosition + local, 1.0);
}
`;

export const bondVertexShader = /* glsl */ `
uniform vec3 bondColor;

varying vec3 vColor;
#ifdef LIT
varying vec3 vNormal;
#endif

void main() {
  vColor = bondColor;
#ifdef LIT
  vNormal = normalize(normalMatrix * normal);
#endif
  gl_Position = projectionMatrix * modelViewMatrix * vec4(position, 1.0);
}
`;

export const shadedFragmentShader = /* glsl */ `
uniform vec3 lightDirection;

varying vec3 vColor;
#ifdef LIT
varying vec3 vNormal;
#endif

void main() {
#ifdef LIT
  float diffuse = max(dot(normalize(vNormal), normalize(lightDirection)), 0.0);
  gl_FragColor = vec4(vColor * (0.35 + 0.65 * diffuse), 1.0);
#else
  gl_FragColor = vec4(vColor, 1.0);
#endif
}
`;
