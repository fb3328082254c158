export default ['apps/*'];
